/**
 * Scan summaries, fingerprints and ordering helpers for downstream
 * consumers (dashboards, alert de-duplication, reports).
 */

import { createHash } from "node:crypto";
import { severityRank } from "./severity.js";
import type { DriftItem, DriftSummary, ScanResult } from "./types.js";

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeScan(result: Pick<ScanResult, "items" | "skipped">): DriftSummary {
  const summary: DriftSummary = {
    totalDriftItems: result.items.length,
    bySeverity: {},
    byDriftType: {},
    byResourceType: {},
    byRegion: {},
    skippedResources: result.skipped.filter((entry) => entry.reason !== "ignored").length,
  };

  for (const item of result.items) {
    increment(summary.bySeverity, item.severity);
    increment(summary.byDriftType, item.driftType);
    increment(summary.byResourceType, item.resourceType);
    increment(summary.byRegion, item.region);
  }

  return summary;
}

/** Stable identity of a drift across scans: MD5 of `address:liveId:driftType`. */
export function driftFingerprint(item: Pick<DriftItem, "terraformAddress" | "liveId" | "driftType">): string {
  return createHash("md5").update(`${item.terraformAddress}:${item.liveId}:${item.driftType}`).digest("hex");
}

export type DriftSortOrder = "severity" | "location";

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareLocation(a: DriftItem, b: DriftItem): number {
  return (
    compareText(a.region, b.region) ||
    compareText(a.resourceType, b.resourceType) ||
    compareText(a.terraformAddress, b.terraformAddress)
  );
}

function compareSeverity(a: DriftItem, b: DriftItem): number {
  return (
    severityRank(a.severity) - severityRank(b.severity) ||
    compareText(a.terraformAddress, b.terraformAddress) ||
    compareText(a.liveId, b.liveId)
  );
}

/**
 * Sorted copy of the items.
 * - `severity`: most severe first, then address and live id
 * - `location`: region, resource type, address
 */
export function sortDriftItems(items: readonly DriftItem[], order: DriftSortOrder = "severity"): DriftItem[] {
  return [...items].sort(order === "severity" ? compareSeverity : compareLocation);
}

/**
 * Merge item lists produced by independent comparison units into one
 * deterministic sequence (stable by region, resource type, address).
 */
export function mergeDriftItems(lists: readonly (readonly DriftItem[])[]): DriftItem[] {
  return sortDriftItems(lists.flat(), "location");
}
