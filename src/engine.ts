/**
 * Drift Detection Engine
 *
 * Pairs declared resources with live records by region and provider
 * identifier, runs the resource kind's comparator on every pair and turns
 * the outcome into drift items. Each resource type is an independent unit: it reads only its
 * own declared list and live collection and writes only its own results.
 */

import { randomUUID } from "node:crypto";
import { isRecord } from "./accessors.js";
import { createDefaultRegistry, type ResourceKindRegistry } from "./comparators/registry.js";
import type { ResourceKind } from "./comparators/kind.js";
import { parseConfig, resolveConfig, type DriftEngineConfigInput, type ResolvedConfig } from "./config.js";
import { createDriftLogger, type DriftLogger } from "./logging/index.js";
import { countDeclaredResources, parseDeclaredState } from "./parser.js";
import { classify } from "./severity.js";
import { countLiveResources, listRegions, liveCollection, validateLiveSnapshot } from "./snapshot.js";
import { toTagMap } from "./tags.js";
import type {
  ComparisonOutcome,
  DeclaredResource,
  DeclaredResourceSet,
  Differences,
  DriftItem,
  DriftType,
  LiveResource,
  LiveSnapshot,
  ScanResult,
  ShapeIssue,
  SkippedResource,
} from "./types.js";

// =============================================================================
// Scan Context
// =============================================================================

/** Everything a scan needs, passed explicitly to every comparison unit. */
export interface ScanContext {
  readonly scanId: string;
  readonly startedAt: Date;
  /** ISO timestamp stamped on every item of the scan */
  readonly timestamp: string;
  readonly config: ResolvedConfig;
  readonly logger: DriftLogger;
  readonly now: () => Date;
}

export interface ScanContextOptions {
  scanId?: string;
  now?: () => Date;
  logger?: DriftLogger;
}

export function createScanContext(config: ResolvedConfig, options: ScanContextOptions = {}): ScanContext {
  const scanId = options.scanId ?? randomUUID();
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const logger = (options.logger ?? createDriftLogger("engine", { level: config.logLevel })).withContext({ scanId });
  return { scanId, startedAt, timestamp: startedAt.toISOString(), config, logger, now };
}

// =============================================================================
// Comparison Units
// =============================================================================

/** Declared resources of one type, with the regions that type is evaluated in. */
export interface ResourceTypeUnit {
  resourceType: string;
  kind: ResourceKind;
  declared: readonly DeclaredResource[];
  regions: readonly string[];
}

export interface UnitResult {
  /** Configuration, tag and missing items in declared order */
  items: DriftItem[];
  extras: DriftItem[];
  skipped: SkippedResource[];
  shapeIssues: ShapeIssue[];
}

interface LocatedRecord {
  record: LiveResource;
  liveId: string;
  region: string;
}

const AVAILABILITY_ZONE = /^([a-z]{2}(?:-[a-z]+)+-\d+)[a-z]$/;

/**
 * Region a declared resource lives in, when its attributes say so:
 * an explicit `region`, the region segment of its ARN, or its availability zone.
 */
export function declaredRegionHint(resource: DeclaredResource): string | undefined {
  const { region, arn, availability_zone: zone } = resource.attributes;
  if (typeof region === "string" && region !== "") return region;
  if (typeof arn === "string") {
    const arnRegion = arn.split(":")[3];
    if (arnRegion) return arnRegion;
  }
  if (typeof zone === "string") {
    const match = AVAILABILITY_ZONE.exec(zone);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

function locationKey(region: string, liveId: string): string {
  return `${region}\u0000${liveId}`;
}

function isExternallyManaged(record: LiveResource, config: ResolvedConfig): boolean {
  const tags = toTagMap(record.Tags);
  return tags?.[config.managedByTag.key] === config.managedByTag.value;
}

function driftTypeOf(differences: Differences): DriftType {
  const keys = Object.keys(differences);
  return keys.length === 1 && keys[0] === "tags" ? "tags" : "configuration";
}

/**
 * Compare one declared/live pair. Comparator failures are returned as a
 * skipped outcome; they never abort the scan.
 */
export function compareResource(
  kind: ResourceKind,
  declared: DeclaredResource,
  live: LiveResource,
  ctx: ScanContext,
  issues: ShapeIssue[],
): ComparisonOutcome {
  try {
    const differences = kind.compare(declared, live, { ignoreTags: ctx.config.ignoreTags, issues });
    return { status: "compared", differences };
  } catch (err) {
    return {
      status: "skipped",
      reason: "resource-shape",
      detail: `comparison failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}

/** Evaluate one resource type against the live snapshot. */
export function evaluateResourceType(unit: ResourceTypeUnit, snapshot: LiveSnapshot, ctx: ScanContext): UnitResult {
  const { kind, resourceType } = unit;
  const { config } = ctx;
  const log = ctx.logger.withContext({ resourceType });
  const result: UnitResult = { items: [], extras: [], skipped: [], shapeIssues: [] };

  const skip = (entry: SkippedResource) => {
    result.skipped.push(entry);
    log.warn(`Skipping ${entry.address ?? entry.liveId ?? resourceType}: ${entry.detail}`, { reason: entry.reason });
  };

  const item = (
    fields: Pick<DriftItem, "resourceName" | "terraformAddress" | "liveId" | "driftType" | "differences" | "region">,
  ): DriftItem => ({
    resourceType,
    ...fields,
    severity: classify(fields.driftType, config.severityThresholds),
    firstDetected: ctx.timestamp,
    lastSeen: ctx.timestamp,
    environment: config.environment,
  });

  // Index live records per region; the first occurrence of an identifier in a region wins
  const located: LocatedRecord[] = [];
  const byRegion = new Map<string, Map<string, LocatedRecord>>();
  for (const region of unit.regions) {
    const byId = new Map<string, LocatedRecord>();
    byRegion.set(region, byId);
    liveCollection(snapshot, region, kind.collection).forEach((record, index) => {
      if (!isRecord(record)) {
        skip({
          reason: "resource-shape",
          resourceType,
          region,
          detail: `${kind.collection}[${index}] is not an object`,
        });
        return;
      }
      const liveId = kind.liveId(record, result.shapeIssues);
      if (!liveId) {
        skip({
          reason: "resource-shape",
          resourceType,
          region,
          detail: `${kind.collection}[${index}] has no ${kind.liveIdField}`,
        });
        return;
      }
      const entry = { record, liveId, region };
      located.push(entry);
      if (!byId.has(liveId)) byId.set(liveId, entry);
    });
  }

  /**
   * Live counterpart of a declared identifier. Regional resources with a
   * region hint match only in that region; without a hint (and for global
   * kinds) the first analysed region holding the identifier wins.
   */
  const findLive = (id: string, hint: string | undefined): LocatedRecord | undefined => {
    if (kind.scope === "regional" && hint !== undefined) return byRegion.get(hint)?.get(id);
    for (const region of unit.regions) {
      const match = byRegion.get(region)?.get(id);
      if (match) return match;
    }
    return undefined;
  };

  // Live records paired with a declared resource (ignored ones included) are never extras
  const matched = new Set<string>();
  const scoped = config.scanRegions !== undefined;

  for (const resource of unit.declared) {
    const id = kind.declaredId(resource, result.shapeIssues);
    const hint = kind.scope === "global" ? config.primaryRegion : declaredRegionHint(resource);
    const match = id ? findLive(id, hint) : undefined;
    if (match) matched.add(locationKey(match.region, match.liveId));

    if (config.ignoreResources.has(resource.address) || (id && config.ignoreResources.has(id))) {
      result.skipped.push({
        reason: "ignored",
        resourceType,
        address: resource.address,
        liveId: id,
        detail: "listed in ignoreResources",
      });
      continue;
    }

    if (!id) {
      skip({
        reason: "resource-shape",
        resourceType,
        address: resource.address,
        detail: `declared attributes carry no ${kind.label} identifier`,
      });
      continue;
    }

    if (!match) {
      const inScope =
        hint === undefined || unit.regions.includes(hint) || (kind.scope === "regional" && !scoped);
      if (!inScope) {
        result.skipped.push({
          reason: "out-of-scope",
          resourceType,
          address: resource.address,
          liveId: id,
          region: hint,
          detail: `region ${hint} is not being scanned`,
        });
        continue;
      }
      result.items.push(
        item({
          resourceName: resource.name,
          terraformAddress: resource.address,
          liveId: id,
          driftType: "missing",
          region: hint ?? config.primaryRegion,
          differences: {
            status: {
              kind: "attribute",
              declared: "present",
              live: "absent",
              impact: `${kind.label} exists in Terraform but was not found in the live environment`,
            },
          },
        }),
      );
      continue;
    }

    const outcome = compareResource(kind, resource, match.record, ctx, result.shapeIssues);
    if (outcome.status === "skipped") {
      skip({
        reason: outcome.reason,
        resourceType,
        address: resource.address,
        liveId: id,
        region: match.region,
        detail: outcome.detail,
      });
      continue;
    }
    if (Object.keys(outcome.differences).length === 0) continue;

    result.items.push(
      item({
        resourceName: resource.name,
        terraformAddress: resource.address,
        liveId: id,
        driftType: driftTypeOf(outcome.differences),
        region: match.region,
        differences: outcome.differences,
      }),
    );
  }

  for (const { record, liveId, region } of located) {
    if (matched.has(locationKey(region, liveId))) continue;
    if (config.ignoreResources.has(liveId)) continue;
    if (isExternallyManaged(record, config)) continue;

    result.extras.push(
      item({
        resourceName: kind.liveName(record, liveId),
        terraformAddress: "N/A",
        liveId,
        driftType: "extra",
        region,
        differences: {
          status: {
            kind: "attribute",
            declared: "absent",
            live: "present",
            impact: `${kind.label} exists in the live environment but is not managed by Terraform`,
          },
          resourceDetails: { kind: "attribute", declared: null, live: kind.describeLive(record, liveId) },
        },
      }),
    );
  }

  for (const issue of result.shapeIssues) {
    log.withContext({ resourceId: issue.resourceId }).warn(`Resource shape warning on ${issue.side} field ${issue.field}`, {
      detail: issue.detail,
    });
  }

  return result;
}

// =============================================================================
// Engine
// =============================================================================

export interface DriftEngineOptions {
  config?: DriftEngineConfigInput;
  registry?: ResourceKindRegistry;
  logger?: DriftLogger;
}

export interface ScanOptions {
  scanId?: string;
  now?: () => Date;
}

/** A parsed resource set, or a state document (object or JSON text). */
export type DeclaredStateInput = DeclaredResourceSet | string | Record<string, unknown>;

export class DriftDetectionEngine {
  readonly config: ResolvedConfig;
  readonly registry: ResourceKindRegistry;
  private readonly logger: DriftLogger;

  constructor(options: DriftEngineOptions = {}) {
    this.config = resolveConfig(parseConfig(options.config ?? {}));
    this.registry = options.registry ?? createDefaultRegistry();
    this.logger = options.logger ?? createDriftLogger("engine", { level: this.config.logLevel });
  }

  /**
   * Run one scan. Throws ParseError or SnapshotShapeError for invalid
   * documents; every other problem is reported on the result.
   */
  scan(declaredState: DeclaredStateInput, liveSnapshot: unknown, options: ScanOptions = {}): ScanResult {
    const ctx = createScanContext(this.config, { ...options, logger: this.logger });
    const declared: DeclaredResourceSet =
      declaredState instanceof Map ? declaredState : parseDeclaredState(declaredState, { logger: ctx.logger });
    const snapshot = validateLiveSnapshot(liveSnapshot);
    const regions = this.selectRegions(snapshot, ctx);

    ctx.logger.info("Drift scan started", {
      regions: regions.length,
      declaredResources: countDeclaredResources(declared),
    });

    const units: ResourceTypeUnit[] = [];
    const skipped: SkippedResource[] = [];

    for (const [resourceType, resources] of declared) {
      const kind = this.registry.get(resourceType);
      if (!kind) {
        for (const resource of resources) {
          skipped.push({
            reason: "unknown-resource-type",
            resourceType,
            address: resource.address,
            detail: `no comparator registered for ${resourceType}`,
          });
        }
        ctx.logger.warn(`No comparator registered for ${resourceType}; skipping ${resources.length} resource(s)`);
        continue;
      }
      units.push({ resourceType, kind, declared: resources, regions: this.regionsFor(kind, regions, ctx) });
    }

    // Live-only types still need extra detection
    for (const kind of this.registry.list()) {
      if (declared.has(kind.resourceType)) continue;
      units.push({ resourceType: kind.resourceType, kind, declared: [], regions: this.regionsFor(kind, regions, ctx) });
    }

    const items: DriftItem[] = [];
    const extras: DriftItem[] = [];
    const shapeIssues: ShapeIssue[] = [];
    for (const unit of units) {
      const unitResult = evaluateResourceType(unit, snapshot, ctx);
      items.push(...unitResult.items);
      extras.push(...unitResult.extras);
      skipped.push(...unitResult.skipped);
      shapeIssues.push(...unitResult.shapeIssues);
    }

    const result: ScanResult = {
      scanId: ctx.scanId,
      startedAt: ctx.timestamp,
      completedAt: ctx.now().toISOString(),
      regions,
      declaredResourceCount: countDeclaredResources(declared),
      liveResourceCount: countLiveResources(snapshot),
      items: [...items, ...extras],
      skipped,
      shapeIssues,
    };

    ctx.logger.info("Drift scan completed", {
      driftItems: result.items.length,
      skipped: skipped.length,
      shapeIssues: shapeIssues.length,
    });

    return result;
  }

  /** Drift items only. */
  detect(declaredState: DeclaredStateInput, liveSnapshot: unknown, options: ScanOptions = {}): DriftItem[] {
    return this.scan(declaredState, liveSnapshot, options).items;
  }

  private selectRegions(snapshot: LiveSnapshot, ctx: ScanContext): string[] {
    const available = listRegions(snapshot);
    const wanted = this.config.scanRegions;
    const regions = wanted ? available.filter((region) => wanted.includes(region)) : available;

    if (wanted) {
      for (const region of wanted) {
        if (!available.includes(region)) ctx.logger.warn(`Region ${region} is not present in the live snapshot`);
      }
    }
    for (const region of regions) {
      ctx.logger.withContext({ region }).debug("Analyzing region");
    }
    return regions;
  }

  private regionsFor(kind: ResourceKind, regions: readonly string[], ctx: ScanContext): string[] {
    if (kind.scope === "regional") return [...regions];
    if (regions.includes(this.config.primaryRegion)) return [this.config.primaryRegion];
    ctx.logger.warn(
      `Primary region ${this.config.primaryRegion} is not being scanned; ${kind.resourceType} live records are not evaluated`,
    );
    return [];
  }
}

/** Parse-and-scan shorthand. */
export function detectDrift(
  declaredState: DeclaredStateInput,
  liveSnapshot: unknown,
  options: DriftEngineOptions & ScanOptions = {},
): ScanResult {
  const { scanId, now, ...engineOptions } = options;
  return new DriftDetectionEngine(engineOptions).scan(declaredState, liveSnapshot, { scanId, now });
}
