/**
 * Tag reconciliation between declared and live tag sets.
 */

import { isDeepStrictEqual } from "node:util";
import { isRecord } from "./accessors.js";
import type { TagDifference, TagValueChange } from "./types.js";

export type TagMap = Record<string, unknown>;

/**
 * Normalize provider tag shapes into a key → value map.
 *
 * Accepts a plain map (`{ Name: "web" }`, as stored by Terraform and
 * returned by some APIs) or a list of `{ Key, Value }` pairs. Returns
 * `undefined` for anything else so callers can report it.
 */
export function toTagMap(value: unknown): TagMap | undefined {
  if (value === undefined || value === null) return {};
  if (Array.isArray(value)) {
    const tags: TagMap = {};
    for (const entry of value) {
      if (!isRecord(entry) || typeof entry.Key !== "string") return undefined;
      tags[entry.Key] = entry.Value;
    }
    return tags;
  }
  if (isRecord(value)) return { ...value };
  return undefined;
}

function withoutIgnored(tags: TagMap, ignoreKeys: ReadonlySet<string>): TagMap {
  const filtered: TagMap = {};
  for (const [key, value] of Object.entries(tags)) {
    if (!ignoreKeys.has(key)) filtered[key] = value;
  }
  return filtered;
}

/**
 * Compare two tag sets after dropping ignored keys.
 * Values are compared strictly: `"1"` and `1` differ.
 */
export function compareTags(
  declaredTags: TagMap,
  liveTags: TagMap,
  ignoreKeys: ReadonlySet<string>,
): TagDifference | null {
  const declared = withoutIgnored(declaredTags, ignoreKeys);
  const live = withoutIgnored(liveTags, ignoreKeys);

  const missingInLive: TagMap = {};
  const extraInLive: TagMap = {};
  const changed: Record<string, TagValueChange> = {};

  for (const [key, value] of Object.entries(declared)) {
    if (!Object.hasOwn(live, key)) {
      missingInLive[key] = value;
    } else if (!isDeepStrictEqual(value, live[key])) {
      changed[key] = { declared: value, live: live[key] };
    }
  }

  for (const [key, value] of Object.entries(live)) {
    if (!Object.hasOwn(declared, key)) extraInLive[key] = value;
  }

  const equal =
    Object.keys(missingInLive).length === 0 &&
    Object.keys(extraInLive).length === 0 &&
    Object.keys(changed).length === 0;
  if (equal) return null;

  return { kind: "tags", declared, live, missingInLive, extraInLive, changed };
}
