import { Controller, Get } from '@nestjs/common';
import { Principal } from '../../shared/auth/auth.types';
import { AccessPipelineService } from '../../shared/auth/access-pipeline.service';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { Organization } from './organization.model';
import { OrganizationsService } from './organizations.service';

@Controller('orgs')
export class OrganizationsController {
  constructor(
    private readonly pipeline: AccessPipelineService,
    private readonly organizationsService: OrganizationsService
  ) {}

  @Get('me')
  me(@CurrentPrincipal() principal: Principal): Promise<Organization> {
    return this.pipeline.execute(principal, 'organization.read', principal.tenantId, (tx) =>
      this.organizationsService.getOrThrow(tx, principal.tenantId)
    );
  }
}
