import { Principal, Role, ROLES } from '../types';
import { NotFoundError, PermissionError } from '../utils/errors';

export type Action =
  | 'template:read'
  | 'template:create'
  | 'template:manage'
  | 'document:read'
  | 'document:create'
  | 'document:manage'
  | 'audit:read';

type Capability =
  | 'template:read'
  | 'template:create'
  | 'template:manage-own'
  | 'template:manage-any'
  | 'document:read'
  | 'document:create'
  | 'document:manage-own'
  | 'document:manage-any'
  | 'audit:read';

const ELEVATED: Capability[] = [
  'template:read',
  'template:create',
  'template:manage-any',
  'document:read',
  'document:create',
  'document:manage-any',
  'audit:read',
];

export const ROLE_CAPABILITIES: Record<Role, ReadonlySet<Capability>> = {
  owner: new Set(ELEVATED),
  admin: new Set(ELEVATED),
  member: new Set<Capability>([
    'template:read',
    'template:create',
    'template:manage-own',
    'document:read',
    'document:create',
    'document:manage-own',
    'audit:read',
  ]),
  viewer: new Set<Capability>(['template:read', 'document:read']),
};

// `own` grants the action only on resources the caller created.
const REQUIRED_CAPABILITY: Record<Action, { any: Capability; own?: Capability }> = {
  'template:read': { any: 'template:read' },
  'template:create': { any: 'template:create' },
  'template:manage': { any: 'template:manage-any', own: 'template:manage-own' },
  'document:read': { any: 'document:read' },
  'document:create': { any: 'document:create' },
  'document:manage': { any: 'document:manage-any', own: 'document:manage-own' },
  'audit:read': { any: 'audit:read' },
};

export interface ProtectedResource {
  entity: 'Template' | 'Document';
  id: string;
  tenantId: string;
  createdBy: string;
}

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

function hasCapability(principal: Principal, action: Action, resource?: ProtectedResource): boolean {
  const capabilities = ROLE_CAPABILITIES[principal.role];
  const required = REQUIRED_CAPABILITY[action];

  if (capabilities.has(required.any)) {
    return true;
  }

  return required.own !== undefined && capabilities.has(required.own) && resource?.createdBy === principal.userId;
}

/**
 * Single permission gate. A resource outside the caller's tenant is reported
 * as missing so its existence does not leak.
 */
export function authorize(principal: Principal, action: Action, resource?: ProtectedResource): void {
  if (resource && resource.tenantId !== principal.tenantId) {
    throw new NotFoundError(resource.entity, resource.id);
  }

  if (!hasCapability(principal, action, resource)) {
    throw new PermissionError(`Role ${principal.role} may not perform ${action}`);
  }
}
