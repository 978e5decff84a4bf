/**
 * Firewall groups (`aws_security_group` ↔ `security_groups`).
 */

import { defineResourceKind } from "./kind.js";

type SecurityGroupView = {
  name: string | undefined;
  description: string | undefined;
};

export const securityGroupKind = defineResourceKind<SecurityGroupView>({
  kind: "security-group",
  resourceType: "aws_security_group",
  label: "Security group",
  collection: "security_groups",
  liveIdField: "GroupId",
  declaredIdFields: ["id"],
  readDeclared: (attributes) => ({
    name: attributes.string("name"),
    description: attributes.string("description"),
  }),
  readLive: (record) => ({
    name: record.string("GroupName"),
    description: record.string("Description"),
  }),
  projections: [{ field: "name" }, { field: "description" }],
  ruleSets: [
    { key: "ingressRules", direction: "ingress", declaredField: "ingress", liveField: "IpPermissions" },
    {
      key: "egressRules",
      direction: "egress",
      declaredField: "egress",
      liveField: "IpPermissionsEgress",
      onlyWhenDeclared: true,
    },
  ],
  liveName: (record) => record.string("GroupName"),
  describeLive: (record) => ({
    groupName: record.string("GroupName") ?? null,
    vpcId: record.string("VpcId") ?? null,
  }),
});
