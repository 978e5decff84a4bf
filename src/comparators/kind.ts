/**
 * Resource kinds: the shared comparator contract.
 *
 * Each kind projects declared attributes and live records into the same
 * typed view, lists which view fields matter, and always finishes with a
 * tag comparison. Kinds are built with `defineResourceKind` so the
 * comparison pipeline is identical for every resource type.
 */

import { isDeepStrictEqual } from "node:util";
import { FieldReader } from "../accessors.js";
import { compareRules, type RuleDirection } from "../rules.js";
import { compareTags, toTagMap, type TagMap } from "../tags.js";
import type { DeclaredResource, Differences, LiveResource, ShapeIssue } from "../types.js";

export type ResourceKindId =
  | "compute-instance"
  | "security-group"
  | "storage-bucket"
  | "database-instance"
  | "function"
  | "identity-role"
  | "generic";

/** Global kinds are evaluated once, in the primary region. */
export type ResourceScope = "regional" | "global";

export interface CompareContext {
  ignoreTags: ReadonlySet<string>;
  /** Sink for fields present with an unexpected shape */
  issues: ShapeIssue[];
}

export interface ResourceKind {
  readonly kind: ResourceKindId;
  /** Terraform resource type, e.g. `aws_instance` */
  readonly resourceType: string;
  /** Human-readable name used in drift notes */
  readonly label: string;
  /** Collection name in the live snapshot, e.g. `ec2_instances` */
  readonly collection: string;
  readonly scope: ResourceScope;
  readonly liveIdField: string;

  declaredId(resource: DeclaredResource, issues: ShapeIssue[]): string | undefined;
  liveId(record: LiveResource, issues: ShapeIssue[]): string | undefined;
  liveName(record: LiveResource, liveId: string): string;
  describeLive(record: LiveResource, liveId: string): Record<string, unknown>;
  compare(declared: DeclaredResource, live: LiveResource, ctx: CompareContext): Differences;
}

export interface AttributeProjection<V extends object> {
  field: keyof V & string;
  impact?: string;
  /** Lists compared as sets */
  unordered?: boolean;
}

export interface RuleSetProjection {
  key: string;
  direction: RuleDirection;
  declaredField: string;
  liveField: string;
  /** Skip unless the declared attributes contain the field */
  onlyWhenDeclared?: boolean;
}

export interface ResourceKindSpec<V extends object> {
  kind: ResourceKindId;
  resourceType: string;
  label: string;
  collection: string;
  scope?: ResourceScope;
  liveIdField: string;
  /** Declared attributes holding the identifier, first present wins */
  declaredIdFields: string[];
  readDeclared(attributes: FieldReader): V;
  readLive(record: FieldReader): V;
  projections: AttributeProjection<V>[];
  ruleSets?: RuleSetProjection[];
  describeLive?(record: FieldReader): Record<string, unknown>;
  liveName?(record: FieldReader): string | undefined;
}

const DECLARED_TAG_FIELDS = ["tags_all", "tags"];
const LIVE_TAG_FIELD = "Tags";

function sortedCopy(value: unknown): unknown {
  if (!Array.isArray(value)) return value;
  return [...value].sort((a, b) => String(a).localeCompare(String(b)));
}

function valuesEqual(declared: unknown, live: unknown, unordered: boolean): boolean {
  if (unordered) return isDeepStrictEqual(sortedCopy(declared), sortedCopy(live));
  return isDeepStrictEqual(declared, live);
}

function unreportedSide(declared: unknown, live: unknown): ShapeIssue["side"] | undefined {
  if (declared === undefined) return "declared";
  if (live === undefined) return "live";
  return undefined;
}

function readTags(reader: FieldReader, fields: string[]): TagMap | undefined {
  const field = fields.find((f) => reader.has(f)) ?? fields[fields.length - 1];
  return toTagMap(reader.raw(field));
}

/** Value of the `Name` tag, if the record carries one. */
export function nameTag(record: FieldReader): string | undefined {
  const tags = toTagMap(record.raw(LIVE_TAG_FIELD));
  const name = tags?.Name;
  return typeof name === "string" && name !== "" ? name : undefined;
}

export function defineResourceKind<V extends object>(spec: ResourceKindSpec<V>): ResourceKind {
  const scope = spec.scope ?? "regional";

  const reader = (
    source: Readonly<Record<string, unknown>>,
    resourceId: string,
    side: "declared" | "live",
    issues: ShapeIssue[],
  ) => new FieldReader(source, { resourceType: spec.resourceType, resourceId, side }, issues);

  return {
    kind: spec.kind,
    resourceType: spec.resourceType,
    label: spec.label,
    collection: spec.collection,
    scope,
    liveIdField: spec.liveIdField,

    declaredId(resource, issues) {
      const attributes = reader(resource.attributes, resource.address, "declared", issues);
      for (const field of spec.declaredIdFields) {
        const id = attributes.string(field);
        if (id) return id;
      }
      return undefined;
    },

    liveId(record, issues) {
      const id = reader(record, "(unidentified)", "live", issues).string(spec.liveIdField);
      return id || undefined;
    },

    liveName(record, liveId) {
      const live = reader(record, liveId, "live", []);
      return spec.liveName?.(live) ?? nameTag(live) ?? liveId;
    },

    describeLive(record, liveId) {
      const live = reader(record, liveId, "live", []);
      const details = spec.describeLive?.(live) ?? {};
      const tags = toTagMap(live.raw(LIVE_TAG_FIELD));
      return { ...details, tags: tags ?? {} };
    },

    compare(declared, live, ctx) {
      const liveId = typeof live[spec.liveIdField] === "string" ? String(live[spec.liveIdField]) : declared.address;
      const declaredReader = reader(declared.attributes, declared.address, "declared", ctx.issues);
      const liveReader = reader(live, liveId, "live", ctx.issues);
      const declaredView = spec.readDeclared(declaredReader);
      const liveView = spec.readLive(liveReader);
      const differences: Differences = {};

      for (const projection of spec.projections) {
        const declaredValue = declaredView[projection.field] ?? null;
        const liveValue = liveView[projection.field] ?? null;
        if (valuesEqual(declaredValue, liveValue, projection.unordered ?? false)) continue;

        // Absent on one side only: still a difference, compared against null
        const absentSide = unreportedSide(declaredView[projection.field], liveView[projection.field]);
        if (absentSide) {
          ctx.issues.push({
            resourceType: spec.resourceType,
            resourceId: absentSide === "declared" ? declared.address : liveId,
            side: absentSide,
            field: projection.field,
            detail: `${projection.field} is absent or unreadable; compared as null`,
          });
        }

        differences[projection.field] = {
          kind: "attribute",
          declared: declaredValue,
          live: liveValue,
          ...(projection.impact ? { impact: projection.impact } : {}),
        };
      }

      for (const ruleSet of spec.ruleSets ?? []) {
        if (ruleSet.onlyWhenDeclared && !declaredReader.has(ruleSet.declaredField)) continue;
        const declaredRules = declaredReader.list(ruleSet.declaredField) ?? [];
        const liveRules = liveReader.list(ruleSet.liveField) ?? [];
        // Rule sets belong to the live record itself, so `self` references resolve to its id
        const ruleDiff = compareRules(declaredRules, liveRules, ruleSet.direction, { selfGroupId: liveId });
        if (ruleDiff) differences[ruleSet.key] = ruleDiff;
      }

      const declaredTags = readTags(declaredReader, DECLARED_TAG_FIELDS);
      const liveTags = readTags(liveReader, [LIVE_TAG_FIELD]);
      if (!declaredTags || !liveTags) {
        ctx.issues.push({
          resourceType: spec.resourceType,
          resourceId: declaredTags ? liveId : declared.address,
          side: declaredTags ? "live" : "declared",
          field: "tags",
          detail: "tags are neither a map nor a list of Key/Value pairs; tag comparison skipped",
        });
      } else {
        const tagDiff = compareTags(declaredTags, liveTags, ctx.ignoreTags);
        if (tagDiff) differences.tags = tagDiff;
      }

      return differences;
    },
  };
}
