import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import type { ConfigInput, ConfigResolution } from "./config.js";
import {
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";

export const PROJECT_CONFIG_FILE = "ghostdiff.config.json";

const truthyValues = new Set(["1", "true", "yes", "on"]);
const falsyValues = new Set(["0", "false", "no", "off"]);
const INTEGER_RE = /^-?\d+$/;

function invalidEnv(key: string, value: string) {
  return new ConfigValidationError({
    source: "env",
    message: `Invalid value for ${key}: ${value}`,
  });
}

function parseBooleanEnv(
  env: NodeJS.ProcessEnv,
  key: string
): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) {
    return true;
  }
  if (falsyValues.has(normalized)) {
    return false;
  }
  throw invalidEnv(key, value);
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  key: string
): number | undefined {
  const value = env[key];
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!INTEGER_RE.test(trimmed)) {
    throw invalidEnv(key, value);
  }
  return Number(trimmed);
}

function parseStringEnv(
  env: NodeJS.ProcessEnv,
  key: string
): string | undefined {
  const trimmed = env[key]?.trim();
  return trimmed ? trimmed : undefined;
}

function stripUndefined(input: Record<string, unknown>) {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      output[key] = value;
    }
  }
  return output;
}

function readConfigFile(path: string, source: string): ConfigInput | null {
  if (!existsSync(path)) {
    return null;
  }
  return decodeConfigInputJson(source, readFileSync(path, "utf8"));
}

// Values are checked again by the schema; the parsers only coerce strings.
export function readEnvConfig(env: NodeJS.ProcessEnv): ConfigInput {
  const comparison = stripUndefined({
    lookaheadWindow: parseIntegerEnv(env, "GHOSTDIFF_LOOKAHEAD_WINDOW"),
    collapseThreshold: parseIntegerEnv(env, "GHOSTDIFF_COLLAPSE_THRESHOLD"),
    previewLength: parseIntegerEnv(env, "GHOSTDIFF_PREVIEW_LENGTH"),
  });
  const renderer = stripUndefined({
    format: parseStringEnv(env, "GHOSTDIFF_RENDERER_FORMAT")?.toLowerCase(),
    layout: parseStringEnv(env, "GHOSTDIFF_RENDERER_LAYOUT")?.toLowerCase(),
    sections: parseStringEnv(env, "GHOSTDIFF_RENDERER_SECTIONS")?.toLowerCase(),
  });
  const telemetry = stripUndefined({
    enabled: parseBooleanEnv(env, "GHOSTDIFF_TELEMETRY_ENABLED"),
    exporter: parseStringEnv(
      env,
      "GHOSTDIFF_TELEMETRY_EXPORTER"
    )?.toLowerCase(),
    endpoint: parseStringEnv(env, "GHOSTDIFF_TELEMETRY_ENDPOINT"),
  });

  const raw: Record<string, unknown> = {};
  if (Object.keys(comparison).length > 0) {
    raw.comparison = comparison;
  }
  if (Object.keys(renderer).length > 0) {
    raw.renderer = renderer;
  }
  if (Object.keys(telemetry).length > 0) {
    raw.telemetry = telemetry;
  }
  return decodeConfigInput("env", raw);
}

export interface ResolveConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig extends ConfigResolution {
  paths: {
    project: string;
    user: string;
  };
}

/**
 * Layers defaults, the project file, the user file and the environment, in
 * that order.
 */
export function resolveConfig(options: ResolveConfigOptions = {}) {
  return Effect.try({
    try: (): ResolvedConfig => {
      const projectPath = join(options.cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
      const userPath = join(
        options.homeDir ?? homedir(),
        ".config",
        "ghostdiff",
        "config.json"
      );

      let resolution: ConfigResolution = {
        value: defaultConfig,
        sources: defaultSources,
      };

      const projectConfig = readConfigFile(projectPath, "project");
      if (projectConfig) {
        resolution = mergeConfig(resolution, projectConfig, "project");
      }

      const userConfig = readConfigFile(userPath, "user");
      if (userConfig) {
        resolution = mergeConfig(resolution, userConfig, "user");
      }

      resolution = mergeConfig(
        resolution,
        readEnvConfig(options.env ?? process.env),
        "env"
      );

      return {
        ...resolution,
        paths: {
          project: projectPath,
          user: userPath,
        },
      };
    },
    catch: (error) =>
      error instanceof ConfigValidationError
        ? error
        : new ConfigValidationError({
            source: "config",
            message: error instanceof Error ? error.message : String(error),
          }),
  });
}
