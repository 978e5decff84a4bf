/**
 * Drift Engine — Errors
 *
 * Only document-shape and configuration failures are thrown. Problems with a
 * single resource are reported as values on the scan result.
 */

export class DriftEngineError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "DriftEngineError";
  }
}

/** The declared-state document is not decodable or not a state document. */
export class ParseError extends DriftEngineError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly errors: string[] = [],
  ) {
    super(`Failed to parse ${source}: ${message}`, "PARSE_ERROR");
    this.name = "ParseError";
  }
}

/** The live snapshot is not a mapping of regions to mappings of collections. */
export class SnapshotShapeError extends DriftEngineError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly errors: string[] = [],
  ) {
    super(`Invalid live snapshot at ${path}: ${message}`, "SNAPSHOT_SHAPE_ERROR");
    this.name = "SnapshotShapeError";
  }
}

export class ConfigError extends DriftEngineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}
