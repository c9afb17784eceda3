import { Body, Controller, Delete, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { AccessPipelineService } from '../../shared/auth/access-pipeline.service';
import { Principal } from '../../shared/auth/auth.types';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { ZodValidationPipe } from '../../shared/validation/zod-validation.pipe';
import { Project } from './project.model';
import {
  CreateProjectInput,
  ListProjectsQuery,
  UpdateProjectInput,
  createProjectSchema,
  listProjectsQuerySchema,
  updateProjectSchema
} from './projects.schemas';
import { ProjectsService } from './projects.service';

@Controller('projects')
export class ProjectsController {
  constructor(
    private readonly pipeline: AccessPipelineService,
    private readonly projectsService: ProjectsService
  ) {}

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body(new ZodValidationPipe(createProjectSchema)) body: CreateProjectInput
  ): Promise<Project> {
    return this.pipeline.execute(principal, 'project.create', null, (tx) =>
      this.projectsService.create(tx, principal, body)
    );
  }

  @Get()
  list(
    @CurrentPrincipal() principal: Principal,
    @Query(new ZodValidationPipe(listProjectsQuerySchema)) query: ListProjectsQuery
  ): Promise<Project[]> {
    return this.pipeline.execute(principal, 'project.read', null, (tx) =>
      this.projectsService.list(tx, principal.tenantId, query)
    );
  }

  @Get(':projectId')
  get(@CurrentPrincipal() principal: Principal, @Param('projectId') projectId: string): Promise<Project> {
    return this.pipeline.execute(principal, 'project.read', projectId, (tx) =>
      this.projectsService.getOrThrow(tx, principal.tenantId, projectId)
    );
  }

  @Patch(':projectId')
  update(
    @CurrentPrincipal() principal: Principal,
    @Param('projectId') projectId: string,
    @Body(new ZodValidationPipe(updateProjectSchema)) body: UpdateProjectInput
  ): Promise<Project> {
    return this.pipeline.execute(principal, 'project.update', projectId, (tx) =>
      this.projectsService.update(tx, principal.tenantId, projectId, body)
    );
  }

  @Delete(':projectId')
  remove(@CurrentPrincipal() principal: Principal, @Param('projectId') projectId: string): Promise<{ ok: true }> {
    return this.pipeline.execute(principal, 'project.delete', projectId, (tx) =>
      this.projectsService.delete(tx, principal.tenantId, projectId)
    );
  }
}
