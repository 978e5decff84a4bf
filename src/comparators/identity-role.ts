/**
 * Identity roles (`aws_iam_role` ↔ `iam_roles`). IAM is global, so roles
 * are only evaluated in the primary region.
 */

import { defineResourceKind } from "./kind.js";

type IdentityRoleView = {
  description: string | undefined;
};

export const identityRoleKind = defineResourceKind<IdentityRoleView>({
  kind: "identity-role",
  resourceType: "aws_iam_role",
  label: "IAM role",
  collection: "iam_roles",
  scope: "global",
  liveIdField: "RoleName",
  declaredIdFields: ["name"],
  readDeclared: (attributes) => ({ description: attributes.string("description") }),
  readLive: (record) => ({ description: record.string("Description") }),
  projections: [{ field: "description" }],
  liveName: (record) => record.string("RoleName"),
  describeLive: (record) => ({
    arn: record.string("Arn") ?? null,
    path: record.string("Path") ?? null,
  }),
});
