import { Action, EntityKind } from '../../shared/auth/authorization';

export type AuditEntryInput = {
  actorUserId: string;
  tenantId: string;
  action: Action;
  entityKind: EntityKind;
  entityId: string;
};

export type AuditEntry = {
  id: string;
  actorUserId: string;
  tenantId: string;
  action: string;
  entityKind: string;
  entityId: string;
  createdAt: string;
};
