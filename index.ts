/**
 * driftlens: Terraform state versus live cloud snapshot drift detection.
 */

// Types
export type * from "./src/types.js";
export { SEVERITIES } from "./src/types.js";

// Errors
export { DriftEngineError, ParseError, SnapshotShapeError, ConfigError } from "./src/errors.js";

// Parsing and document shapes
export {
  parseDeclaredState,
  decodeStateDocument,
  readStateMetadata,
  countDeclaredResources,
  type ParseOptions,
} from "./src/parser.js";
export { validateLiveSnapshot, listRegions, liveCollection, countLiveResources } from "./src/snapshot.js";
export { DeclaredStateDocumentSchema, LiveSnapshotSchema, validateShape, type SchemaViolation } from "./src/schema.js";

// Comparison building blocks
export { FieldReader, isRecord } from "./src/accessors.js";
export { compareTags, toTagMap, type TagMap } from "./src/tags.js";
export { compareRules, normalizeRule, normalizeRules, describeRule, type RuleDirection, type RuleFormat } from "./src/rules.js";
export { classify, DEFAULT_SEVERITY_THRESHOLDS, isSeverity, meetsSeverity, severityRank } from "./src/severity.js";
export * from "./src/comparators/index.js";

// Engine
export {
  DriftDetectionEngine,
  createScanContext,
  compareResource,
  evaluateResourceType,
  declaredRegionHint,
  detectDrift,
  type DeclaredStateInput,
  type DriftEngineOptions,
  type ResourceTypeUnit,
  type ScanContext,
  type ScanContextOptions,
  type ScanOptions,
  type UnitResult,
} from "./src/engine.js";
export { summarizeScan, driftFingerprint, sortDriftItems, mergeDriftItems, type DriftSortOrder } from "./src/summary.js";

// Configuration
export {
  driftEngineConfigSchema,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  readEnvOverrides,
  resolveConfig,
  validateDriftEngineConfig,
  type DriftEngineConfig,
  type DriftEngineConfigInput,
  type LoadConfigOptions,
  type ResolvedConfig,
} from "./src/config.js";

// Logging
export * from "./src/logging/index.js";

// CLI
export { createDriftCli, formatDriftItem, type CliIO, type DriftCliOptions } from "./src/cli.js";
export { VERSION } from "./src/version.js";
