/**
 * Drift Engine Logging
 *
 * Levelled logging for scans. Every entry carries its subsystem
 * (`driftlens/engine`, `driftlens/engine/parser`) plus whatever part of the
 * scan context the caller attached: scan id, region, resource type and
 * resource id.
 */

// =============================================================================
// Types
// =============================================================================

/** Threshold levels; `silent` drops everything. */
export const LOG_LEVELS = ["debug", "info", "warn", "silent"] as const;

export type DriftLogLevel = (typeof LOG_LEVELS)[number];

export type EntryLevel = Exclude<DriftLogLevel, "silent">;

/** Where in a scan an entry was written */
export interface ScanLogContext {
  scanId?: string;
  region?: string;
  resourceType?: string;
  resourceId?: string;
}

export interface DriftLogEntry extends ScanLogContext {
  timestamp: Date;
  level: EntryLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface LogTransport {
  write(entry: DriftLogEntry): void;
}

export interface DriftLogger {
  readonly subsystem: string;

  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;

  child(name: string): DriftLogger;
  withContext(context: ScanLogContext): DriftLogger;
}

const LEVEL_RANK: Record<DriftLogLevel, number> = { debug: 0, info: 1, warn: 2, silent: 3 };

export function shouldLog(level: EntryLevel, threshold: DriftLogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

// =============================================================================
// Formatting
// =============================================================================

const CONTEXT_LABELS: ReadonlyArray<[keyof ScanLogContext, string]> = [
  ["scanId", "scan"],
  ["region", "region"],
  ["resourceType", "type"],
  ["resourceId", "resource"],
];

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const LEVEL_COLORS: Record<EntryLevel, string> = { debug: DIM, info: "\x1b[32m", warn: "\x1b[33m" };

export interface FormatOptions {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}

/** `<iso> WARN  [driftlens/engine] message (scan=… region=…) {"meta":1}` */
export function formatEntry(entry: DriftLogEntry, options: FormatOptions = {}): string {
  const { colors = false, timestamps = true, includeMetadata = true } = options;
  const dim = (text: string) => (colors ? `${DIM}${text}${RESET}` : text);
  const parts: string[] = [];

  if (timestamps) parts.push(dim(entry.timestamp.toISOString()));
  const level = entry.level.toUpperCase().padEnd(5);
  parts.push(colors ? `${LEVEL_COLORS[entry.level]}${level}${RESET}` : level);
  parts.push(`[${entry.subsystem}]`, entry.message);

  const context = CONTEXT_LABELS.flatMap(([key, label]) => (entry[key] ? [`${label}=${entry[key]}`] : []));
  if (context.length > 0) parts.push(dim(`(${context.join(" ")})`));

  if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
    parts.push(dim(JSON.stringify(entry.metadata)));
  }

  return parts.join(" ");
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes formatted entries to the console. With `stream: "stderr"` every
 * level goes to stderr and stdout stays free for CLI output.
 */
export class ConsoleTransport implements LogTransport {
  private readonly stream: "stdout" | "stderr";
  private readonly format: FormatOptions;

  constructor(options: { stream?: "stdout" | "stderr"; format?: FormatOptions } = {}) {
    this.stream = options.stream ?? "stdout";
    const tty = this.stream === "stderr" ? process.stderr.isTTY : process.stdout.isTTY;
    this.format = { colors: tty ?? false, ...options.format };
  }

  write(entry: DriftLogEntry): void {
    const line = formatEntry(entry, this.format);
    if (this.stream === "stderr") console.error(line);
    else if (entry.level === "warn") console.warn(line);
    else console.log(line);
  }
}

/** Keeps entries for callers that surface scan warnings themselves. */
export class MemoryTransport implements LogTransport {
  readonly entries: DriftLogEntry[] = [];

  write(entry: DriftLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: EntryLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger
// =============================================================================

class ScanLogger implements DriftLogger {
  constructor(
    readonly subsystem: string,
    private readonly level: DriftLogLevel,
    private readonly transports: readonly LogTransport[],
    private readonly context: ScanLogContext,
  ) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  child(name: string): DriftLogger {
    return new ScanLogger(`${this.subsystem}/${name}`, this.level, this.transports, this.context);
  }

  withContext(context: ScanLogContext): DriftLogger {
    return new ScanLogger(this.subsystem, this.level, this.transports, { ...this.context, ...context });
  }

  private log(level: EntryLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;
    const entry: DriftLogEntry = { timestamp: new Date(), level, subsystem: this.subsystem, message, metadata, ...this.context };
    for (const transport of this.transports) transport.write(entry);
  }
}

export function createDriftLogger(
  subsystem: string,
  options: { level?: DriftLogLevel; transports?: LogTransport[] } = {},
): DriftLogger {
  return new ScanLogger(`driftlens/${subsystem}`, options.level ?? "info", options.transports ?? [new ConsoleTransport()], {});
}
