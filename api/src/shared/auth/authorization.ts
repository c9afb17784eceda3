import { Principal, UserRole } from './auth.types';

export type Capability =
  | 'read'
  | 'create'
  | 'update-any'
  | 'update-own'
  | 'delete-any'
  | 'delete-own'
  | 'create-tag'
  | 'manage-users'
  | 'view-audit';

export type EntityKind = 'organization' | 'project' | 'tag' | 'user' | 'activity';

/**
 * Fixed capability table. Roles do not inherit from each other: every
 * exemption a role has is listed on its own row.
 */
export const ROLE_CAPABILITIES: Readonly<Record<UserRole, ReadonlySet<Capability>>> = {
  admin: new Set<Capability>(['read', 'create', 'update-any', 'delete-any', 'manage-users', 'view-audit']),
  editor: new Set<Capability>(['read', 'create', 'update-own', 'delete-own', 'create-tag']),
  viewer: new Set<Capability>(['read'])
};

const OWNERSHIP_SCOPED: ReadonlySet<Capability> = new Set<Capability>(['update-own', 'delete-own']);

type ActionDefinition = {
  grants: readonly Capability[];
  mutating: boolean;
  entity: EntityKind;
};

const ACTION_TABLE = {
  'organization.read': { grants: ['read'], mutating: false, entity: 'organization' },
  'project.read': { grants: ['read'], mutating: false, entity: 'project' },
  'project.create': { grants: ['create'], mutating: true, entity: 'project' },
  'project.update': { grants: ['update-any', 'update-own'], mutating: true, entity: 'project' },
  'project.delete': { grants: ['delete-any', 'delete-own'], mutating: true, entity: 'project' },
  'tag.read': { grants: ['read'], mutating: false, entity: 'tag' },
  'tag.create': { grants: ['create-tag', 'create'], mutating: true, entity: 'tag' },
  'user.read': { grants: ['manage-users'], mutating: false, entity: 'user' },
  'user.create': { grants: ['manage-users'], mutating: true, entity: 'user' },
  'user.update-role': { grants: ['manage-users'], mutating: true, entity: 'user' },
  'audit.read': { grants: ['view-audit'], mutating: false, entity: 'activity' }
} as const satisfies Record<string, ActionDefinition>;

export type Action = keyof typeof ACTION_TABLE;

export const ACTIONS: Readonly<Record<Action, ActionDefinition>> = ACTION_TABLE;

export type ResourceMeta = {
  tenantId: string;
  // null for entities without a single owner (tags, users, the tenant itself).
  ownerUserId: string | null;
};

export type Decision = 'allow' | 'deny';

export function authorize(principal: Principal, action: Action, resource: ResourceMeta): Decision {
  if (resource.tenantId !== principal.tenantId) {
    return 'deny';
  }

  const held = ROLE_CAPABILITIES[principal.role];
  const granting = ACTIONS[action].grants.find((capability) => held.has(capability));
  if (!granting) {
    return 'deny';
  }

  if (OWNERSHIP_SCOPED.has(granting)) {
    return resource.ownerUserId !== null && resource.ownerUserId === principal.userId ? 'allow' : 'deny';
  }

  return 'allow';
}

/** Tenant-level target for reads of a collection or for creating into it. */
export function tenantScope(principal: Principal): ResourceMeta {
  return { tenantId: principal.tenantId, ownerUserId: null };
}

/** Ownership stamped on anything the principal creates. */
export function creationStamp(principal: Principal): { tenantId: string; ownerUserId: string } {
  return { tenantId: principal.tenantId, ownerUserId: principal.userId };
}
