/**
 * Drift Engine — CLI Commands
 */

import * as fs from "node:fs";
import type { Command } from "commander";
import { getDefaultConfig, loadConfig, type DriftEngineConfig } from "./config.js";
import { DriftDetectionEngine } from "./engine.js";
import { ConfigError, DriftEngineError, ParseError, SnapshotShapeError } from "./errors.js";
import { ConsoleTransport, createDriftLogger, type DriftLogger, type LogTransport } from "./logging/index.js";
import { countDeclaredResources, parseDeclaredState, readStateMetadata } from "./parser.js";
import { classify, isSeverity, meetsSeverity } from "./severity.js";
import { driftFingerprint, sortDriftItems, summarizeScan, type DriftSortOrder } from "./summary.js";
import { SEVERITIES, type DifferenceDetail, type DriftItem, type Severity } from "./types.js";

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  readFile(path: string): string;
  env: NodeJS.ProcessEnv;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (path) => fs.readFileSync(path, "utf-8"),
  env: process.env,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export interface DriftCliOptions {
  io?: CliIO;
  /** Defaults to a stderr console transport so stdout stays machine-readable */
  logTransports?: LogTransport[];
}

/** Exit code for `scan --fail-on-drift` when drift was found. */
export const EXIT_DRIFT_FOUND = 2;
export const EXIT_FAILURE = 1;

const SORT_ORDERS: readonly DriftSortOrder[] = ["severity", "location"];

function isSortOrder(value: string): value is DriftSortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

function parseSortOrder(value: string): DriftSortOrder {
  if (isSortOrder(value)) return value;
  throw new DriftEngineError(`Unknown sort order "${value}" (expected ${SORT_ORDERS.join(" or ")})`, "USAGE");
}

function parseSeverity(value: string): Severity {
  if (isSeverity(value)) return value;
  throw new DriftEngineError(`Unknown severity "${value}" (expected ${SEVERITIES.join(", ")})`, "USAGE");
}

function readJson(io: CliIO, path: string, label: string): unknown {
  const text = io.readFile(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DriftEngineError(
      `${label} ${path} is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
      "INVALID_JSON",
    );
  }
}

function describeDifference(key: string, detail: DifferenceDetail): string {
  switch (detail.kind) {
    case "tags": {
      const parts = [
        ...Object.keys(detail.missingInLive).map((tag) => `-${tag}`),
        ...Object.keys(detail.extraInLive).map((tag) => `+${tag}`),
        ...Object.keys(detail.changed).map((tag) => `~${tag}`),
      ];
      return `${key}: ${parts.join(" ")}`;
    }
    case "rules":
      return `${key}: ${detail.impact}`;
    case "attribute":
      if (key === "resourceDetails") return `${key}: ${JSON.stringify(detail.live)}`;
      return `${key}: ${JSON.stringify(detail.declared)} -> ${JSON.stringify(detail.live)}`;
  }
}

export function formatDriftItem(item: DriftItem): string[] {
  const lines = [
    `[${item.severity}] ${item.driftType} ${item.resourceType} ${item.terraformAddress} (${item.liveId}) ${item.region}`,
  ];
  for (const [key, detail] of Object.entries(item.differences)) {
    lines.push(`    ${describeDifference(key, detail)}`);
  }
  return lines;
}

function formatCounts(counts: Record<string, number>): string {
  const entries = Object.entries(counts);
  return entries.length > 0 ? entries.map(([key, count]) => `${key} ${count}`).join(", ") : "none";
}

export function createDriftCli(options: DriftCliOptions = {}) {
  const io = options.io ?? processIO;

  const loggerFor = (config: DriftEngineConfig): DriftLogger =>
    createDriftLogger("cli", {
      level: config.logLevel,
      transports: options.logTransports ?? [new ConsoleTransport({ stream: "stderr" })],
    });

  const configFrom = (path: string | undefined): DriftEngineConfig => loadConfig({ path, env: io.env });

  /** Report a failure and set the exit code; document and config errors list their details. */
  const fail = (err: unknown): void => {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof ParseError || err instanceof SnapshotShapeError) {
      for (const detail of err.errors) io.stderr(`  ${detail}`);
    } else if (err instanceof ConfigError) {
      for (const issue of err.issues) io.stderr(`  ${issue}`);
    }
    io.setExitCode(EXIT_FAILURE);
  };

  return (program: Command) => {
    // ── scan ────────────────────────────────────────────────────
    program
      .command("scan")
      .description("Compare a Terraform state file against a live snapshot")
      .requiredOption("--state <file>", "Path to terraform.tfstate")
      .requiredOption("--snapshot <file>", "Path to the live snapshot JSON")
      .option("--config <file>", "Path to the configuration JSON")
      .option("--json", "Output as JSON")
      .option("--sort <order>", "Sort items by severity or location")
      .option("--min-severity <level>", "Only report items at or above this severity")
      .option("--fail-on-drift", "Exit with code 2 when drift is found")
      .action(
        (opts: {
          state: string;
          snapshot: string;
          config?: string;
          json?: boolean;
          sort?: string;
          minSeverity?: string;
          failOnDrift?: boolean;
        }) => {
          try {
            const sort = opts.sort === undefined ? undefined : parseSortOrder(opts.sort);
            const minSeverity = opts.minSeverity === undefined ? undefined : parseSeverity(opts.minSeverity);

            const config = configFrom(opts.config);
            const engine = new DriftDetectionEngine({ config, logger: loggerFor(config) });
            const state = readJson(io, opts.state, "State file");
            const snapshot = readJson(io, opts.snapshot, "Snapshot file");
            const declared = parseDeclaredState(state, { source: opts.state });
            const result = engine.scan(declared, snapshot);

            let items = result.items;
            if (minSeverity !== undefined) items = items.filter((item) => meetsSeverity(item.severity, minSeverity));
            if (sort !== undefined) items = sortDriftItems(items, sort);
            const summary = summarizeScan({ items, skipped: result.skipped });

            if (opts.json) {
              const withFingerprints = items.map((item) => ({ ...item, fingerprint: driftFingerprint(item) }));
              io.stdout(JSON.stringify({ ...result, items: withFingerprints, summary }, null, 2));
            } else {
              io.stdout(`Drift scan ${result.scanId}`);
              io.stdout(`  Regions: ${result.regions.join(", ") || "none"}`);
              io.stdout(`  Declared resources: ${result.declaredResourceCount} | Live resources: ${result.liveResourceCount}`);
              io.stdout(`  Drift items: ${summary.totalDriftItems} (${formatCounts(summary.bySeverity)})`);
              if (summary.skippedResources > 0) io.stdout(`  Skipped resources: ${summary.skippedResources}`);
              for (const item of items) {
                for (const line of formatDriftItem(item)) io.stdout(line);
              }
            }

            if (opts.failOnDrift && items.length > 0) io.setExitCode(EXIT_DRIFT_FOUND);
          } catch (err) {
            fail(err);
          }
        },
      );

    // ── parse ───────────────────────────────────────────────────
    program
      .command("parse")
      .description("List the managed resources of a Terraform state file")
      .argument("<file>", "Path to terraform.tfstate")
      .option("--json", "Output as JSON")
      .action((file: string, opts: { json?: boolean }) => {
        try {
          const state = readJson(io, file, "State file");
          const resources = parseDeclaredState(state, { source: file });
          const metadata = readStateMetadata(state, file);

          if (opts.json) {
            io.stdout(JSON.stringify({ metadata, resources: Object.fromEntries(resources) }, null, 2));
            return;
          }

          io.stdout(`Terraform state: ${file}`);
          io.stdout(`  Terraform version: ${metadata.terraformVersion ?? "unknown"} | Serial: ${metadata.serial ?? "unknown"}`);
          io.stdout(`  Managed resources: ${countDeclaredResources(resources)}`);
          for (const [type, list] of resources) {
            io.stdout(`${type} (${list.length})`);
            for (const resource of list) io.stdout(`  ${resource.address}`);
          }
        } catch (err) {
          fail(err);
        }
      });

    // ── config ──────────────────────────────────────────────────
    program
      .command("config")
      .description("Print the effective configuration")
      .option("--config <file>", "Path to the configuration JSON")
      .option("--defaults", "Ignore files and environment; print the defaults")
      .action((opts: { config?: string; defaults?: boolean }) => {
        try {
          const config = opts.defaults ? getDefaultConfig() : configFrom(opts.config);
          io.stdout(JSON.stringify(config, null, 2));
        } catch (err) {
          fail(err);
        }
      });

    // ── classify ────────────────────────────────────────────────
    program
      .command("classify")
      .description("Print the severity assigned to a drift type")
      .argument("<driftType>", "Drift type, e.g. missing, configuration, tags")
      .option("--config <file>", "Path to the configuration JSON")
      .action((driftType: string, opts: { config?: string }) => {
        try {
          const config = configFrom(opts.config);
          io.stdout(classify(driftType, config.severityThresholds));
        } catch (err) {
          fail(err);
        }
      });
  };
}
