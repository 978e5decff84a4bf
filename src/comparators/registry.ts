/**
 * Resource-type → resource-kind lookup used by the matcher.
 */

import { computeInstanceKind } from "./compute-instance.js";
import { databaseInstanceKind } from "./database-instance.js";
import { functionKind } from "./function.js";
import { createGenericKind, loadBalancerKind, subnetKind, vpcKind } from "./generic.js";
import { identityRoleKind } from "./identity-role.js";
import type { ResourceKind } from "./kind.js";
import { securityGroupKind } from "./security-group.js";
import { storageBucketKind } from "./storage-bucket.js";

export interface GenericRegistration {
  resourceType: string;
  /** Collection name in the live snapshot */
  collection: string;
  liveIdField: string;
  /** Declared attribute holding the identifier; defaults to `id` */
  declaredIdField?: string;
  label?: string;
}

export class ResourceKindRegistry {
  private readonly kinds = new Map<string, ResourceKind>();

  /** Registering a type again replaces the previous kind. */
  register(kind: ResourceKind): this {
    this.kinds.set(kind.resourceType, kind);
    return this;
  }

  registerGeneric(registration: GenericRegistration): ResourceKind {
    const kind = createGenericKind({
      resourceType: registration.resourceType,
      collection: registration.collection,
      liveIdField: registration.liveIdField,
      declaredIdFields: registration.declaredIdField ? [registration.declaredIdField] : undefined,
      label: registration.label,
    });
    this.register(kind);
    return kind;
  }

  get(resourceType: string): ResourceKind | undefined {
    return this.kinds.get(resourceType);
  }

  has(resourceType: string): boolean {
    return this.kinds.has(resourceType);
  }

  list(): ResourceKind[] {
    return [...this.kinds.values()];
  }
}

export const BUILTIN_KINDS: readonly ResourceKind[] = [
  computeInstanceKind,
  securityGroupKind,
  storageBucketKind,
  databaseInstanceKind,
  functionKind,
  identityRoleKind,
  vpcKind,
  subnetKind,
  loadBalancerKind,
];

export function createDefaultRegistry(): ResourceKindRegistry {
  const registry = new ResourceKindRegistry();
  for (const kind of BUILTIN_KINDS) registry.register(kind);
  return registry;
}
