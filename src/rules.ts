/**
 * Firewall rule-set normalization and comparison.
 *
 * Declared (Terraform) and live (provider API) rules are reduced to
 * `{ protocol, fromPort, toPort, sourceCidrs, sourceGroups, prefixLists }`,
 * merged per port range and sorted, so ordering and grouping in either
 * source do not matter.
 */

import { isRecord } from "./accessors.js";
import type { NormalizedRule, RuleChange, RuleDifference } from "./types.js";

export type RuleFormat = "declared" | "live";

export type RuleDirection = "ingress" | "egress";

const PROTOCOL_ALIASES: Record<string, string> = {
  "6": "tcp",
  "17": "udp",
  "1": "icmp",
  "58": "icmpv6",
  all: "-1",
};

export const ALL_PROTOCOLS = "-1";

/** Stands in for the rule's own group when its id is not known. */
export const SELF_GROUP = "self";

export interface RuleOptions {
  /** Id of the group the rules belong to; resolves Terraform's `self = true` */
  selfGroupId?: string;
}

function normalizeProtocol(value: unknown): string {
  if (typeof value !== "string" && typeof value !== "number") return "";
  const protocol = String(value).trim().toLowerCase();
  return PROTOCOL_ALIASES[protocol] ?? protocol;
}

function normalizePort(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

function stringsOf(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

function fieldValues(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) return [];
  const values: string[] = [];
  for (const entry of value) {
    const item = isRecord(entry) ? entry[field] : undefined;
    if (typeof item === "string") values.push(item);
  }
  return values;
}

function sortedUnique(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function declaredGroups(rule: Record<string, unknown>, options: RuleOptions): string[] {
  const groups = stringsOf(rule.security_groups);
  if (rule.self === true) groups.push(options.selfGroupId ?? SELF_GROUP);
  return groups;
}

/** Normalize a single rule; returns null for entries that are not objects. */
export function normalizeRule(rule: unknown, format: RuleFormat, options: RuleOptions = {}): NormalizedRule | null {
  if (!isRecord(rule)) return null;

  const protocol = normalizeProtocol(format === "declared" ? rule.protocol : rule.IpProtocol);
  const cidrs =
    format === "declared"
      ? [...stringsOf(rule.cidr_blocks), ...stringsOf(rule.ipv6_cidr_blocks)]
      : [...fieldValues(rule.IpRanges, "CidrIp"), ...fieldValues(rule.Ipv6Ranges, "CidrIpv6")];
  const groups = format === "declared" ? declaredGroups(rule, options) : fieldValues(rule.UserIdGroupPairs, "GroupId");
  const prefixLists =
    format === "declared" ? stringsOf(rule.prefix_list_ids) : fieldValues(rule.PrefixListIds, "PrefixListId");

  // Port numbers carry no meaning for all-protocol rules (Terraform stores 0, the API omits them)
  const allTraffic = protocol === ALL_PROTOCOLS;
  const fromPort = allTraffic ? null : normalizePort(format === "declared" ? rule.from_port : rule.FromPort);
  const toPort = allTraffic ? null : normalizePort(format === "declared" ? rule.to_port : rule.ToPort);

  return withReferences({ protocol, fromPort, toPort, sourceCidrs: sortedUnique(cidrs) }, groups, prefixLists);
}

type RuleBase = Omit<NormalizedRule, "sourceGroups" | "prefixLists">;

function withReferences(base: RuleBase, groups: readonly string[], prefixLists: readonly string[]): NormalizedRule {
  return {
    ...base,
    ...(groups.length > 0 ? { sourceGroups: sortedUnique(groups) } : {}),
    ...(prefixLists.length > 0 ? { prefixLists: sortedUnique(prefixLists) } : {}),
  };
}

function ruleKey(rule: NormalizedRule): string {
  return `${rule.protocol}|${rule.fromPort ?? "*"}|${rule.toPort ?? "*"}`;
}

function compareNullablePorts(a: number | null, b: number | null): number {
  return (a ?? -1) - (b ?? -1);
}

export function compareNormalizedRules(a: NormalizedRule, b: NormalizedRule): number {
  if (a.protocol !== b.protocol) return a.protocol < b.protocol ? -1 : 1;
  return compareNullablePorts(a.fromPort, b.fromPort) || compareNullablePorts(a.toPort, b.toPort);
}

/**
 * Normalize a rule list. Rules sharing protocol and port range are merged
 * into one entry with the union of their sources; the result is sorted by
 * `(protocol, fromPort, toPort)`.
 */
export function normalizeRules(rules: readonly unknown[], format: RuleFormat, options: RuleOptions = {}): NormalizedRule[] {
  const merged = new Map<string, NormalizedRule>();

  for (const raw of rules) {
    const rule = normalizeRule(raw, format, options);
    if (!rule) continue;

    const key = ruleKey(rule);
    const existing = merged.get(key);
    if (existing) {
      merged.set(
        key,
        withReferences(
          {
            protocol: existing.protocol,
            fromPort: existing.fromPort,
            toPort: existing.toPort,
            sourceCidrs: sortedUnique([...existing.sourceCidrs, ...rule.sourceCidrs]),
          },
          [...(existing.sourceGroups ?? []), ...(rule.sourceGroups ?? [])],
          [...(existing.prefixLists ?? []), ...(rule.prefixLists ?? [])],
        ),
      );
    } else {
      merged.set(key, rule);
    }
  }

  return [...merged.values()].sort(compareNormalizedRules);
}

function sourcesOf(rule: NormalizedRule): string[] {
  return [...rule.sourceCidrs, ...(rule.sourceGroups ?? []), ...(rule.prefixLists ?? [])];
}

function sameSources(a: NormalizedRule, b: NormalizedRule): boolean {
  const left = sourcesOf(a);
  const right = sourcesOf(b);
  return left.length === right.length && left.every((source, i) => source === right[i]);
}

function describePorts(rule: NormalizedRule): string {
  const protocol = rule.protocol === ALL_PROTOCOLS ? "all traffic" : rule.protocol || "unknown protocol";
  if (rule.fromPort === null && rule.toPort === null) return protocol;
  if (rule.fromPort === rule.toPort) return `${protocol} port ${rule.fromPort}`;
  return `${protocol} ports ${rule.fromPort ?? "*"}-${rule.toPort ?? "*"}`;
}

export function describeRule(rule: NormalizedRule): string {
  const sources = sourcesOf(rule);
  return `${describePorts(rule)} from ${sources.length > 0 ? sources.join(", ") : "no sources"}`;
}

/**
 * Compare declared and live rule lists in their native shapes.
 * Returns null when both normalize to the same rule set.
 */
export function compareRules(
  declaredRules: readonly unknown[],
  liveRules: readonly unknown[],
  direction: RuleDirection = "ingress",
  options: RuleOptions = {},
): RuleDifference | null {
  const declared = normalizeRules(declaredRules, "declared", options);
  const live = normalizeRules(liveRules, "live", options);

  const declaredByKey = new Map(declared.map((rule) => [ruleKey(rule), rule]));
  const liveByKey = new Map(live.map((rule) => [ruleKey(rule), rule]));

  const added = live.filter((rule) => !declaredByKey.has(ruleKey(rule)));
  const removed = declared.filter((rule) => !liveByKey.has(ruleKey(rule)));
  const modified: RuleChange[] = [];
  for (const rule of declared) {
    const counterpart = liveByKey.get(ruleKey(rule));
    if (counterpart && !sameSources(rule, counterpart)) {
      modified.push({ declared: rule, live: counterpart });
    }
  }

  if (added.length === 0 && removed.length === 0 && modified.length === 0) return null;

  const changes = [
    ...added.map((rule) => `added ${describeRule(rule)}`),
    ...removed.map((rule) => `removed ${describeRule(rule)}`),
    ...modified.map(
      (change) =>
        `sources changed on ${describePorts(change.declared)}: [${sourcesOf(change.declared).join(", ")}] -> [${sourcesOf(change.live).join(", ")}]`,
    ),
  ];

  return {
    kind: "rules",
    declared,
    live,
    added,
    removed,
    modified,
    impact: `Network security rules differ for ${direction}: ${changes.join("; ")}`,
  };
}
