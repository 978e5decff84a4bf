/**
 * Drift Engine Logging Module Index
 */

export {
  type DriftLogLevel,
  type EntryLevel,
  type DriftLogEntry,
  type LogTransport,
  type DriftLogger,
  type ScanLogContext,
  type FormatOptions,
  LOG_LEVELS,
  shouldLog,
  formatEntry,
  ConsoleTransport,
  MemoryTransport,
  createDriftLogger,
} from "./logger.js";
