import { Schema } from "effect";
import type { ComparisonOptions } from "./diff.js";

export class ConfigValidationError extends Schema.TaggedError<ConfigValidationError>()(
  "ConfigValidationError",
  {
    source: Schema.String,
    message: Schema.String,
  }
) {}

const PositiveInt = Schema.Int.pipe(Schema.greaterThanOrEqualTo(1));

const ComparisonConfigSchema = Schema.Struct({
  lookaheadWindow: PositiveInt,
  collapseThreshold: PositiveInt,
  previewLength: PositiveInt,
});

const RendererConfigSchema = Schema.Struct({
  format: Schema.Literal("ansi", "plain", "json"),
  layout: Schema.Literal("unified", "side-by-side"),
  sections: Schema.Literal("expanded", "collapsed"),
});

const TelemetryConfigSchema = Schema.Struct({
  enabled: Schema.Boolean,
  exporter: Schema.Literal("console", "otlp-http"),
  endpoint: Schema.optional(Schema.String),
});

export const ConfigSchema = Schema.Struct({
  comparison: ComparisonConfigSchema,
  renderer: RendererConfigSchema,
  telemetry: TelemetryConfigSchema,
});

export const ConfigInputSchema = Schema.Struct({
  comparison: Schema.optional(Schema.partial(ComparisonConfigSchema)),
  renderer: Schema.optional(Schema.partial(RendererConfigSchema)),
  telemetry: Schema.optional(Schema.partial(TelemetryConfigSchema)),
});
const ConfigInputJsonSchema = Schema.parseJson(ConfigInputSchema);

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Type<typeof ConfigInputSchema>;
export type ComparisonConfig = Config["comparison"];
export type RendererConfig = Config["renderer"];
export type TelemetryConfig = Config["telemetry"];

export type ConfigSource = "default" | "project" | "user" | "env";

export interface ConfigSources {
  comparison: Record<keyof ComparisonConfig, ConfigSource>;
  renderer: Record<keyof RendererConfig, ConfigSource>;
  telemetry: Record<keyof TelemetryConfig, ConfigSource>;
}

export interface ConfigResolution {
  value: Config;
  sources: ConfigSources;
}

type Mutable<T> = { -readonly [K in keyof T]: Mutable<T[K]> };

export const defaultConfig: Config = {
  comparison: {
    lookaheadWindow: 5,
    collapseThreshold: 3,
    previewLength: 60,
  },
  renderer: {
    format: "ansi",
    layout: "unified",
    sections: "expanded",
  },
  telemetry: {
    enabled: false,
    exporter: "console",
  },
};

export const defaultSources: ConfigSources = {
  comparison: {
    lookaheadWindow: "default",
    collapseThreshold: "default",
    previewLength: "default",
  },
  renderer: {
    format: "default",
    layout: "default",
    sections: "default",
  },
  telemetry: {
    enabled: "default",
    exporter: "default",
    endpoint: "default",
  },
};

function toValidationError(source: string, error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return new ConfigValidationError({ source, message });
}

export function decodeConfigInput(source: string, input: unknown): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    throw toValidationError(source, error);
  }
}

export function decodeConfigInputJson(
  source: string,
  input: string
): ConfigInput {
  try {
    return Schema.decodeUnknownSync(ConfigInputJsonSchema)(input, {
      onExcessProperty: "error",
    });
  } catch (error) {
    throw toValidationError(source, error);
  }
}

export function mergeConfig(
  current: ConfigResolution,
  overrides: ConfigInput,
  source: ConfigSource
): ConfigResolution {
  const next: Mutable<ConfigResolution> = {
    value: {
      comparison: { ...current.value.comparison },
      renderer: { ...current.value.renderer },
      telemetry: { ...current.value.telemetry },
    },
    sources: {
      comparison: { ...current.sources.comparison },
      renderer: { ...current.sources.renderer },
      telemetry: { ...current.sources.telemetry },
    },
  };

  const applyComparison = <K extends keyof ComparisonConfig>(
    key: K,
    value: ComparisonConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.comparison[key] = value;
      next.sources.comparison[key] = source;
    }
  };
  const applyRenderer = <K extends keyof RendererConfig>(
    key: K,
    value: RendererConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.renderer[key] = value;
      next.sources.renderer[key] = source;
    }
  };
  const applyTelemetry = <K extends keyof TelemetryConfig>(
    key: K,
    value: TelemetryConfig[K] | undefined
  ) => {
    if (value !== undefined) {
      next.value.telemetry[key] = value;
      next.sources.telemetry[key] = source;
    }
  };

  if (overrides.comparison) {
    applyComparison("lookaheadWindow", overrides.comparison.lookaheadWindow);
    applyComparison(
      "collapseThreshold",
      overrides.comparison.collapseThreshold
    );
    applyComparison("previewLength", overrides.comparison.previewLength);
  }

  if (overrides.renderer) {
    applyRenderer("format", overrides.renderer.format);
    applyRenderer("layout", overrides.renderer.layout);
    applyRenderer("sections", overrides.renderer.sections);
  }

  if (overrides.telemetry) {
    applyTelemetry("enabled", overrides.telemetry.enabled);
    applyTelemetry("exporter", overrides.telemetry.exporter);
    applyTelemetry("endpoint", overrides.telemetry.endpoint);
  }

  return next;
}

export function comparisonOptionsFrom(config: Config): ComparisonOptions {
  return {
    lookaheadWindow: config.comparison.lookaheadWindow,
    collapseThreshold: config.comparison.collapseThreshold,
    previewLength: config.comparison.previewLength,
  };
}
