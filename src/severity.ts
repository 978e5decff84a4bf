/**
 * Severity classification for drift categories.
 */

import { SEVERITIES, type Severity, type SeverityThresholds } from "./types.js";

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = {
  CRITICAL: ["missing", "extra"],
  HIGH: ["configuration"],
  MEDIUM: ["tags"],
  LOW: ["metadata"],
};

/**
 * Return the first severity (most severe first) whose list contains the
 * drift type. Unlisted drift types classify as LOW.
 */
export function classify(driftType: string, thresholds: Partial<SeverityThresholds>): Severity {
  for (const severity of SEVERITIES) {
    if (thresholds[severity]?.includes(driftType)) return severity;
  }
  return "LOW";
}

/** Lower rank is more severe. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export function meetsSeverity(severity: Severity, minimum: Severity): boolean {
  return severityRank(severity) <= severityRank(minimum);
}
