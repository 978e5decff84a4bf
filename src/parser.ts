/**
 * Drift Engine — State Parser
 *
 * Converts a terraform.tfstate document into canonical declared resources,
 * grouped by resource type in document order.
 */

import { isRecord } from "./accessors.js";
import { ParseError } from "./errors.js";
import type { DriftLogger } from "./logging/index.js";
import { DeclaredStateDocumentSchema, formatViolations, validateShape, type DeclaredStateDocumentShape } from "./schema.js";
import type { DeclaredResource, DeclaredResourceSet, DeclaredStateMetadata } from "./types.js";

export interface ParseOptions {
  /** Identifies the document in errors and warnings (file path, bucket key, ...) */
  source?: string;
  logger?: DriftLogger;
}

const DEFAULT_SOURCE = "<declared-state>";

/** Decode and shape-check a state document; throws ParseError. */
export function decodeStateDocument(input: unknown, source = DEFAULT_SOURCE): DeclaredStateDocumentShape {
  let doc: unknown = input;

  if (typeof input === "string") {
    try {
      doc = JSON.parse(input);
    } catch (err) {
      throw new ParseError(`document is not valid JSON (${err instanceof Error ? err.message : String(err)})`, source);
    }
  }

  if (!isRecord(doc)) {
    throw new ParseError("document is not a JSON object", source);
  }

  const result = validateShape(DeclaredStateDocumentSchema, doc);
  if (!result.valid || !result.value) {
    throw new ParseError("document is not a Terraform state document", source, formatViolations(result.errors));
  }

  return result.value;
}

/** Parse a declared-state document into managed resources keyed by type. */
export function parseDeclaredState(input: unknown, options: ParseOptions = {}): DeclaredResourceSet {
  const source = options.source ?? DEFAULT_SOURCE;
  const log = options.logger?.child("parser");
  const doc = decodeStateDocument(input, source);
  const byType: DeclaredResourceSet = new Map();

  (doc.resources ?? []).forEach((entry, index) => {
    if (!isRecord(entry)) {
      log?.warn("Skipping resource entry that is not an object", { source, index });
      return;
    }
    if (entry.mode !== "managed") return;

    const type = entry.type;
    const name = entry.name;
    if (typeof type !== "string" || type === "" || typeof name !== "string" || name === "") {
      log?.warn("Skipping managed resource without type or name", { source, index });
      return;
    }

    const modulePrefix = typeof entry.module === "string" && entry.module !== "" ? `${entry.module}.` : "";
    const baseAddress = `${modulePrefix}${type}.${name}`;
    const instances: unknown[] = Array.isArray(entry.instances) ? entry.instances : [];

    if (entry.instances !== undefined && !Array.isArray(entry.instances)) {
      log?.warn("Managed resource has non-list instances; treating as none", { source, address: baseAddress });
    }

    let list = byType.get(type);
    if (!list) {
      list = [];
      byType.set(type, list);
    }

    for (const instance of instances) {
      const attributes = isRecord(instance) && isRecord(instance.attributes) ? instance.attributes : {};
      const indexKey = isRecord(instance) ? instance.index_key : undefined;

      const resource: DeclaredResource = {
        type,
        name,
        address: `${baseAddress}${formatIndexKey(indexKey)}`,
        attributes,
      };
      list.push(resource);
    }
  });

  log?.debug("Parsed declared state", {
    source,
    types: byType.size,
    resources: countDeclaredResources(byType),
  });

  return byType;
}

/** `[0]` for count, `["blue"]` for for_each, nothing for single instances. */
function formatIndexKey(indexKey: unknown): string {
  if (typeof indexKey === "number") return `[${indexKey}]`;
  if (typeof indexKey === "string") return `[${JSON.stringify(indexKey)}]`;
  return "";
}

export function readStateMetadata(input: unknown, source = DEFAULT_SOURCE): DeclaredStateMetadata {
  const doc = decodeStateDocument(input, source);
  return {
    version: typeof doc.version === "number" ? doc.version : null,
    terraformVersion: typeof doc.terraform_version === "string" ? doc.terraform_version : null,
    serial: typeof doc.serial === "number" ? doc.serial : null,
    lineage: typeof doc.lineage === "string" ? doc.lineage : null,
  };
}

export function countDeclaredResources(resources: DeclaredResourceSet): number {
  let total = 0;
  for (const list of resources.values()) total += list.length;
  return total;
}
