/**
 * Tag-only comparison for resource types without bespoke rules.
 */

import { defineResourceKind, type ResourceKind, type ResourceScope } from "./kind.js";

export interface GenericKindOptions {
  resourceType: string;
  collection: string;
  liveIdField: string;
  /** Defaults to `["id"]` */
  declaredIdFields?: string[];
  label?: string;
  scope?: ResourceScope;
  /** Live fields copied into the details of extra resources */
  detailFields?: string[];
}

export function createGenericKind(options: GenericKindOptions): ResourceKind {
  const detailFields = options.detailFields ?? [];
  return defineResourceKind<Record<string, never>>({
    kind: "generic",
    resourceType: options.resourceType,
    label: options.label ?? options.resourceType,
    collection: options.collection,
    scope: options.scope,
    liveIdField: options.liveIdField,
    declaredIdFields: options.declaredIdFields ?? ["id"],
    readDeclared: () => ({}),
    readLive: () => ({}),
    projections: [],
    describeLive: (record) =>
      Object.fromEntries(detailFields.map((field) => [field, record.raw(field) ?? null])),
  });
}

export const vpcKind = createGenericKind({
  resourceType: "aws_vpc",
  label: "VPC",
  collection: "vpcs",
  liveIdField: "VpcId",
  detailFields: ["CidrBlock", "State", "IsDefault"],
});

export const subnetKind = createGenericKind({
  resourceType: "aws_subnet",
  label: "Subnet",
  collection: "subnets",
  liveIdField: "SubnetId",
  detailFields: ["VpcId", "CidrBlock", "AvailabilityZone"],
});

/** Terraform stores the load balancer ARN as `id` (and `arn`). */
export const loadBalancerKind = createGenericKind({
  resourceType: "aws_lb",
  label: "Load balancer",
  collection: "load_balancers",
  liveIdField: "LoadBalancerArn",
  declaredIdFields: ["arn", "id"],
  detailFields: ["LoadBalancerName", "Type", "Scheme"],
});
