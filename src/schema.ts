/**
 * Document-shape schemas for the two engine inputs.
 *
 * Only the outer structure is enforced here; the contents of individual
 * resources are read through tolerant accessors so one malformed record
 * cannot fail a scan.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

export const DeclaredStateDocumentSchema = Type.Object(
  {
    version: Type.Optional(Type.Unknown()),
    terraform_version: Type.Optional(Type.Unknown()),
    serial: Type.Optional(Type.Unknown()),
    lineage: Type.Optional(Type.Unknown()),
    resources: Type.Optional(Type.Array(Type.Unknown())),
  },
  { additionalProperties: true },
);

export type DeclaredStateDocumentShape = Static<typeof DeclaredStateDocumentSchema>;

/** Collection lists, plus string markers (e.g. `"region"`) and absent collections. */
export const RegionResourcesSchema = Type.Record(
  Type.String(),
  Type.Union([Type.Array(Type.Unknown()), Type.String(), Type.Null()]),
);

export const LiveSnapshotSchema = Type.Record(
  Type.String(),
  Type.Union([Type.String(), RegionResourcesSchema]),
);

export type LiveSnapshotShape = Static<typeof LiveSnapshotSchema>;

export interface SchemaValidation<T> {
  valid: boolean;
  value?: T;
  errors: SchemaViolation[];
}

export interface SchemaViolation {
  /** Dotted path, `(root)` for the document itself */
  path: string;
  message: string;
}

/** Convert a JSON pointer (`/us-east-1/ec2_instances`) into a dotted path. */
export function pointerToPath(pointer: string): string {
  if (!pointer || pointer === "/") return "(root)";
  return pointer
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"))
    .join(".");
}

export function validateShape<T extends TSchema>(schema: T, value: unknown): SchemaValidation<Static<T>> {
  if (Check(schema, value)) {
    return { valid: true, value, errors: [] };
  }

  const errors: SchemaViolation[] = [];
  for (const error of Errors(schema, value)) {
    errors.push({ path: pointerToPath(error.path), message: error.message });
  }

  return {
    valid: false,
    errors: errors.length > 0 ? errors : [{ path: "(root)", message: "Value does not match schema" }],
  };
}

export function formatViolations(errors: SchemaViolation[]): string[] {
  return errors.map((e) => `${e.path}: ${e.message}`);
}
