/**
 * Object-storage buckets (`aws_s3_bucket` ↔ `s3_buckets`).
 *
 * Versioning and default encryption live in differently nested blocks on
 * each side. `undefined` (not reported) and `null` (reported as none)
 * compare equal; a setting present on one side only is drift.
 */

import type { FieldReader } from "../accessors.js";
import { defineResourceKind } from "./kind.js";

type StorageBucketView = {
  versioning: boolean | undefined;
  encryption: string | null | undefined;
};

function declaredVersioning(attributes: FieldReader): boolean | undefined {
  if (!attributes.has("versioning")) return undefined;
  const block = attributes.block("versioning");
  if (!block) return false;
  return block.boolean("enabled") ?? false;
}

function liveVersioning(record: FieldReader): boolean | undefined {
  const versioning = record.record("Versioning");
  if (!versioning) return undefined;
  return versioning.string("Status") === "Enabled";
}

/** `server_side_encryption_configuration[0].rule[0].apply_server_side_encryption_by_default[0].sse_algorithm` */
function declaredEncryption(attributes: FieldReader): string | null | undefined {
  if (!attributes.has("server_side_encryption_configuration")) return undefined;
  const defaults = attributes
    .block("server_side_encryption_configuration")
    ?.block("rule")
    ?.block("apply_server_side_encryption_by_default");
  return defaults?.string("sse_algorithm") ?? null;
}

/** `Encryption.Rules[0].ApplyServerSideEncryptionByDefault.SSEAlgorithm` */
function liveEncryption(record: FieldReader): string | null | undefined {
  const encryption = record.record("Encryption");
  if (!encryption) return undefined;
  const [rule] = encryption.records("Rules");
  return rule?.record("ApplyServerSideEncryptionByDefault")?.string("SSEAlgorithm") ?? null;
}

export const storageBucketKind = defineResourceKind<StorageBucketView>({
  kind: "storage-bucket",
  resourceType: "aws_s3_bucket",
  label: "S3 bucket",
  collection: "s3_buckets",
  liveIdField: "Name",
  declaredIdFields: ["id", "bucket"],
  readDeclared: (attributes) => ({
    versioning: declaredVersioning(attributes),
    encryption: declaredEncryption(attributes),
  }),
  readLive: (record) => ({
    versioning: liveVersioning(record),
    encryption: liveEncryption(record),
  }),
  projections: [
    { field: "versioning", impact: "Data protection and compliance implications" },
    { field: "encryption", impact: "Security and compliance implications" },
  ],
  liveName: (record) => record.string("Name"),
  describeLive: (record) => ({
    region: record.string("Region") ?? null,
    creationDate: record.string("CreationDate") ?? null,
  }),
});
