export {
  defineResourceKind,
  nameTag,
  type AttributeProjection,
  type CompareContext,
  type ResourceKind,
  type ResourceKindId,
  type ResourceKindSpec,
  type ResourceScope,
  type RuleSetProjection,
} from "./kind.js";
export { computeInstanceKind } from "./compute-instance.js";
export { securityGroupKind } from "./security-group.js";
export { storageBucketKind } from "./storage-bucket.js";
export { databaseInstanceKind } from "./database-instance.js";
export { functionKind } from "./function.js";
export { identityRoleKind } from "./identity-role.js";
export { createGenericKind, loadBalancerKind, subnetKind, vpcKind, type GenericKindOptions } from "./generic.js";
export {
  BUILTIN_KINDS,
  ResourceKindRegistry,
  createDefaultRegistry,
  type GenericRegistration,
} from "./registry.js";
