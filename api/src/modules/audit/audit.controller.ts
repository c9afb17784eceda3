import { Controller, Get, Query } from '@nestjs/common';
import { AccessPipelineService } from '../../shared/auth/access-pipeline.service';
import { Principal } from '../../shared/auth/auth.types';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { ZodValidationPipe } from '../../shared/validation/zod-validation.pipe';
import { AuditEntry } from './audit-entry.model';
import { ListAuditQuery, listAuditQuerySchema } from './audit.schemas';
import { AuditService } from './audit.service';

@Controller('activity')
export class AuditController {
  constructor(
    private readonly pipeline: AccessPipelineService,
    private readonly auditService: AuditService
  ) {}

  @Get()
  list(
    @CurrentPrincipal() principal: Principal,
    @Query(new ZodValidationPipe(listAuditQuerySchema)) query: ListAuditQuery
  ): Promise<AuditEntry[]> {
    return this.pipeline.execute(principal, 'audit.read', null, (tx) =>
      this.auditService.listForTenant(tx, principal, query)
    );
  }
}
