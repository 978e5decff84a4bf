/**
 * Managed database instances (`aws_db_instance` ↔ `rds_instances`).
 */

import { defineResourceKind } from "./kind.js";

type DatabaseInstanceView = {
  instanceClass: string | undefined;
  engineVersion: string | undefined;
  allocatedStorage: number | undefined;
};

export const databaseInstanceKind = defineResourceKind<DatabaseInstanceView>({
  kind: "database-instance",
  resourceType: "aws_db_instance",
  label: "RDS instance",
  collection: "rds_instances",
  liveIdField: "DBInstanceIdentifier",
  // Recent provider versions store the DbiResourceId in `id`; `identifier` matches the API
  declaredIdFields: ["identifier", "id"],
  readDeclared: (attributes) => ({
    instanceClass: attributes.string("instance_class"),
    engineVersion: attributes.string("engine_version"),
    allocatedStorage: attributes.number("allocated_storage"),
  }),
  readLive: (record) => ({
    instanceClass: record.string("DBInstanceClass"),
    engineVersion: record.string("EngineVersion"),
    allocatedStorage: record.number("AllocatedStorage"),
  }),
  projections: [
    { field: "instanceClass", impact: "Performance and cost implications" },
    { field: "engineVersion", impact: "Compatibility and security implications" },
    { field: "allocatedStorage", impact: "Storage capacity and cost implications" },
  ],
  liveName: (record) => record.string("DBInstanceIdentifier"),
  describeLive: (record) => ({
    instanceClass: record.string("DBInstanceClass") ?? null,
    engine: record.string("Engine") ?? null,
    status: record.string("DBInstanceStatus") ?? null,
  }),
});
