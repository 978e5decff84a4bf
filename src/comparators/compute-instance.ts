/**
 * Compute instances (`aws_instance` ↔ `ec2_instances`).
 */

import type { FieldReader } from "../accessors.js";
import { defineResourceKind } from "./kind.js";

type ComputeInstanceView = {
  instanceClass: string | undefined;
  imageId: string | undefined;
  availabilityZone: string | undefined;
  securityGroups: string[] | undefined;
};

/** VPC instances list group IDs under `vpc_security_group_ids`; classic ones under `security_groups`. */
function declaredSecurityGroups(attributes: FieldReader): string[] | undefined {
  const vpcGroups = attributes.stringList("vpc_security_group_ids");
  if (vpcGroups && vpcGroups.length > 0) return vpcGroups;
  return attributes.stringList("security_groups") ?? vpcGroups;
}

function liveSecurityGroups(record: FieldReader): string[] | undefined {
  if (!record.has("SecurityGroups")) return undefined;
  const ids: string[] = [];
  for (const group of record.records("SecurityGroups")) {
    const id = group.string("GroupId");
    if (id) ids.push(id);
  }
  return ids;
}

export const computeInstanceKind = defineResourceKind<ComputeInstanceView>({
  kind: "compute-instance",
  resourceType: "aws_instance",
  label: "EC2 instance",
  collection: "ec2_instances",
  liveIdField: "InstanceId",
  declaredIdFields: ["id"],
  readDeclared: (attributes) => ({
    instanceClass: attributes.string("instance_type"),
    imageId: attributes.string("ami"),
    availabilityZone: attributes.string("availability_zone"),
    securityGroups: declaredSecurityGroups(attributes),
  }),
  readLive: (record) => ({
    instanceClass: record.string("InstanceType"),
    imageId: record.string("ImageId"),
    availabilityZone: record.record("Placement")?.string("AvailabilityZone"),
    securityGroups: liveSecurityGroups(record),
  }),
  projections: [
    { field: "instanceClass", impact: "Performance and cost implications" },
    { field: "imageId", impact: "Security and compatibility implications" },
    { field: "availabilityZone", impact: "Location and networking implications" },
    { field: "securityGroups", impact: "Network security implications", unordered: true },
  ],
  describeLive: (record) => ({
    instanceType: record.string("InstanceType") ?? null,
    state: record.record("State")?.string("Name") ?? null,
  }),
});
