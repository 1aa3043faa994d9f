export { compareDocumentsTraced } from "./compare.js";
export type {
  ComparisonConfig,
  Config,
  ConfigInput,
  ConfigResolution,
  ConfigSource,
  ConfigSources,
  RendererConfig,
  TelemetryConfig,
} from "./config.js";
export {
  ConfigInputSchema,
  ConfigSchema,
  ConfigValidationError,
  comparisonOptionsFrom,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";
export type { ResolveConfigOptions, ResolvedConfig } from "./config-resolve.js";
export {
  PROJECT_CONFIG_FILE,
  readEnvConfig,
  resolveConfig,
} from "./config-resolve.js";
export type { DiagnosticsBundle } from "./diagnostics.js";
export { createDiagnosticsBundle } from "./diagnostics.js";
export type {
  CollapsedSection,
  ComparisonOptions,
  DiffLine,
  DiffLineType,
  DiffResult,
  MatchLine,
  ModifiedLine,
  OnlyInGhostLine,
  OnlyInOriginalLine,
} from "./diff.js";
export {
  compareDocuments,
  countDifferences,
  listDifferenceIndices,
} from "./diff.js";
export type { AlignOptions, AmbiguousStep } from "./diff-align.js";
export { alignLines, resolveAmbiguousStep } from "./diff-align.js";
export type { CollapseOptions } from "./diff-collapse.js";
export {
  buildPreview,
  collapseMatches,
  DEFAULT_COLLAPSE_THRESHOLD,
  DEFAULT_PREVIEW_LENGTH,
  describeSection,
} from "./diff-collapse.js";
export { filterFalsePositives } from "./diff-filter.js";
export { extractKey } from "./diff-keys.js";
export { isDifference } from "./diff-line.js";
export { splitLines, trimLine } from "./diff-lines.js";
export {
  DEFAULT_LOOKAHEAD_WINDOW,
  findLookaheadMatch,
} from "./diff-lookahead.js";
export type { JumpTarget } from "./diff-navigation.js";
export {
  differenceLineAt,
  expandAllSections,
  jumpTargetFor,
  nextDifference,
  previousDifference,
  sectionContaining,
  toggleSection,
} from "./diff-navigation.js";
export type { DiffReport } from "./diff-schema.js";
export { DiffReportSchema } from "./diff-schema.js";
export { renderJson, toDiffReport } from "./render-json.js";
export type {
  ComparisonSession,
  ComparisonSnapshot,
  SessionOptions,
} from "./session.js";
export { createComparisonSession, sessionOptionsFrom } from "./session.js";
export type {
  TelemetryAttributes,
  TelemetryOptions,
  TelemetryService,
} from "./telemetry.js";
export {
  deriveEndpoint,
  Telemetry,
  TelemetryDisabled,
  TelemetryLive,
} from "./telemetry.js";
