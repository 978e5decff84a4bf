/**
 * Live snapshot access: shape validation, region listing and collection
 * lookup. The snapshot is `region → collection → records`; string values at
 * either level are metadata markers and are skipped.
 */

import { isRecord, describeType } from "./accessors.js";
import { SnapshotShapeError } from "./errors.js";
import { LiveSnapshotSchema, formatViolations, validateShape } from "./schema.js";
import type { LiveSnapshot } from "./types.js";

/** Throws SnapshotShapeError naming the first offending path. */
export function validateLiveSnapshot(snapshot: unknown): LiveSnapshot {
  if (!isRecord(snapshot)) {
    throw new SnapshotShapeError(`expected a mapping of regions, got ${describeType(snapshot)}`, "(root)");
  }

  const result = validateShape(LiveSnapshotSchema, snapshot);
  if (result.valid && result.value) return result.value;

  const errors = formatViolations(result.errors);
  for (const [region, collections] of Object.entries(snapshot)) {
    if (typeof collections === "string") continue;
    if (!isRecord(collections)) {
      throw new SnapshotShapeError(
        `expected a mapping of collections, got ${describeType(collections)}`,
        region,
        errors,
      );
    }
    for (const [collection, records] of Object.entries(collections)) {
      if (records === null || typeof records === "string" || Array.isArray(records)) continue;
      throw new SnapshotShapeError(`expected a list of resources, got ${describeType(records)}`, `${region}.${collection}`, errors);
    }
  }

  throw new SnapshotShapeError("snapshot does not match the expected shape", "(root)", errors);
}

/** Region identifiers in snapshot order, without metadata keys. */
export function listRegions(snapshot: LiveSnapshot): string[] {
  return Object.entries(snapshot)
    .filter(([, value]) => isRecord(value))
    .map(([region]) => region);
}

/** Records of one collection in one region; missing collections read as empty. */
export function liveCollection(snapshot: LiveSnapshot, region: string, collection: string): readonly unknown[] {
  const collections = snapshot[region];
  if (!isRecord(collections)) return [];
  const records = collections[collection];
  return Array.isArray(records) ? records : [];
}

/** Total records across every region and collection. */
export function countLiveResources(snapshot: LiveSnapshot): number {
  let total = 0;
  for (const collections of Object.values(snapshot)) {
    if (!isRecord(collections)) continue;
    for (const records of Object.values(collections)) {
      if (Array.isArray(records)) total += records.length;
    }
  }
  return total;
}
