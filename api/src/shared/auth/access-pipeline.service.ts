import { Injectable } from '@nestjs/common';
import { AuditService } from '../../modules/audit/audit.service';
import { DbExecutor, PostgresService } from '../database/postgres.service';
import { ResourceMetaRepository } from '../database/resource-meta.repository';
import { ForbiddenError } from '../errors/app-errors';
import { StructuredLoggerService } from '../logging/structured-logger.service';
import { Principal } from './auth.types';
import { ACTIONS, Action, ResourceMeta, authorize, tenantScope } from './authorization';
import { PrincipalResolverService } from './principal-resolver.service';

export type GuardedOperation<T> = (tx: DbExecutor, resource: ResourceMeta) => Promise<T>;

/**
 * Composes one guarded unit of work:
 * load target (tenant-scoped) -> authorize -> effect -> audit, all inside a
 * single transaction. A denial or any failure rolls everything back.
 */
@Injectable()
export class AccessPipelineService {
  constructor(
    private readonly db: PostgresService,
    private readonly resolver: PrincipalResolverService,
    private readonly resources: ResourceMetaRepository,
    private readonly audit: AuditService,
    private readonly logger: StructuredLoggerService
  ) {}

  async authorizeAndExecute<T>(
    accessToken: string,
    action: Action,
    entityId: string | null,
    operation: GuardedOperation<T>
  ): Promise<T> {
    const principal = await this.resolver.resolve(accessToken);
    return this.execute(principal, action, entityId, operation);
  }

  /**
   * `entityId` names an existing entity of the action's kind; null targets the
   * principal's tenant (collection reads and creation).
   */
  execute<T>(
    principal: Principal,
    action: Action,
    entityId: string | null,
    operation: GuardedOperation<T>
  ): Promise<T> {
    const definition = ACTIONS[action];

    return this.db.transaction(principal.tenantId, async (tx) => {
      const resource =
        entityId === null
          ? tenantScope(principal)
          : await this.resources.load(tx, definition.entity, entityId, principal.tenantId, {
              forUpdate: definition.mutating
            });

      if (authorize(principal, action, resource) === 'deny') {
        this.logger.warn(
          {
            type: 'access_denied',
            userId: principal.userId,
            tenantId: principal.tenantId,
            role: principal.role,
            action,
            entity: definition.entity,
            entityId
          },
          'AccessPipeline'
        );
        throw new ForbiddenError();
      }

      const result = await operation(tx, resource);

      if (definition.mutating) {
        await this.audit.record(tx, {
          actorUserId: principal.userId,
          tenantId: principal.tenantId,
          action,
          entityKind: definition.entity,
          entityId: entityId ?? entityIdOf(result)
        });
      }

      return result;
    });
  }
}

function entityIdOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'id' in value && typeof value.id === 'string') {
    return value.id;
  }
  throw new Error('Mutation result does not identify the created entity');
}
