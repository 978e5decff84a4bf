/**
 * Drift Engine — Type Definitions
 *
 * Canonical resource model, drift items, difference details and the
 * raw document shapes the engine consumes.
 */

// ── Declared State (terraform.tfstate) ─────────────────────────

export interface DeclaredStateDocument {
  version?: number;
  terraform_version?: string;
  serial?: number;
  lineage?: string;
  outputs?: Record<string, unknown>;
  resources: DeclaredStateResourceEntry[];
}

export interface DeclaredStateResourceEntry {
  module?: string;
  mode?: string;
  type?: string;
  name?: string;
  provider?: string;
  instances?: DeclaredStateInstance[];
}

export interface DeclaredStateInstance {
  index_key?: string | number;
  schema_version?: number;
  attributes?: Record<string, unknown>;
  dependencies?: string[];
}

export interface DeclaredStateMetadata {
  version: number | null;
  terraformVersion: string | null;
  serial: number | null;
  lineage: string | null;
}

// ── Canonical Resource Model ───────────────────────────────────

/** One managed instance from the declared state, addressed as `<type>.<name>`. */
export interface DeclaredResource {
  readonly type: string;
  readonly name: string;
  readonly address: string;
  readonly attributes: Readonly<Record<string, unknown>>;
}

/** Provider-shaped record from the live snapshot. Read-only to the engine. */
export type LiveResource = Readonly<Record<string, unknown>>;

/** Declared resources keyed by resource type, in document order. */
export type DeclaredResourceSet = Map<string, DeclaredResource[]>;

/**
 * Live snapshot: region → collection name → provider records.
 * String values at either level are metadata markers.
 */
export type LiveSnapshot = Record<string, Record<string, unknown> | string>;

// ── Drift Items ────────────────────────────────────────────────

export type DriftType = "configuration" | "missing" | "extra" | "tags";

export const SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW"] as const;

export type Severity = (typeof SEVERITIES)[number];

export type SeverityThresholds = Record<Severity, string[]>;

export interface AttributeDifference {
  kind: "attribute";
  declared: unknown;
  live: unknown;
  impact?: string;
}

export interface TagValueChange {
  declared: unknown;
  live: unknown;
}

export interface TagDifference {
  kind: "tags";
  /** Filtered declared tags */
  declared: Record<string, unknown>;
  /** Filtered live tags */
  live: Record<string, unknown>;
  missingInLive: Record<string, unknown>;
  extraInLive: Record<string, unknown>;
  changed: Record<string, TagValueChange>;
}

export interface NormalizedRule {
  protocol: string;
  fromPort: number | null;
  toPort: number | null;
  sourceCidrs: string[];
  /** Referenced security groups, sorted; omitted when there are none */
  sourceGroups?: string[];
  /** Referenced managed prefix lists, sorted; omitted when there are none */
  prefixLists?: string[];
}

export interface RuleChange {
  declared: NormalizedRule;
  live: NormalizedRule;
}

export interface RuleDifference {
  kind: "rules";
  declared: NormalizedRule[];
  live: NormalizedRule[];
  added: NormalizedRule[];
  removed: NormalizedRule[];
  modified: RuleChange[];
  impact: string;
}

export type DifferenceDetail = AttributeDifference | TagDifference | RuleDifference;

export type Differences = Record<string, DifferenceDetail>;

export interface DriftItem {
  resourceType: string;
  resourceName: string;
  /** `"N/A"` for extra resources */
  terraformAddress: string;
  liveId: string;
  driftType: DriftType;
  severity: Severity;
  differences: Differences;
  firstDetected: string;
  lastSeen: string;
  environment: string;
  region: string;
}

// ── Per-resource Outcomes ──────────────────────────────────────

export type SkipReason = "resource-shape" | "unknown-resource-type" | "ignored" | "out-of-scope";

export interface SkippedResource {
  reason: SkipReason;
  resourceType: string;
  address?: string;
  liveId?: string;
  region?: string;
  detail: string;
}

/** A field that was present but not in the expected shape; treated as absent. */
export interface ShapeIssue {
  resourceType: string;
  resourceId: string;
  side: "declared" | "live";
  field: string;
  detail: string;
}

export type ComparisonOutcome =
  | { status: "compared"; differences: Differences }
  | { status: "skipped"; reason: SkipReason; detail: string };

// ── Scan Result ────────────────────────────────────────────────

export interface ScanResult {
  scanId: string;
  startedAt: string;
  completedAt: string;
  regions: string[];
  declaredResourceCount: number;
  liveResourceCount: number;
  items: DriftItem[];
  skipped: SkippedResource[];
  shapeIssues: ShapeIssue[];
}

export interface DriftSummary {
  totalDriftItems: number;
  bySeverity: Record<string, number>;
  byDriftType: Record<string, number>;
  byResourceType: Record<string, number>;
  byRegion: Record<string, number>;
  skippedResources: number;
}
