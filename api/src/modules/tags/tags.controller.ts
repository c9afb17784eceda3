import { Body, Controller, Get, Post } from '@nestjs/common';
import { AccessPipelineService } from '../../shared/auth/access-pipeline.service';
import { Principal } from '../../shared/auth/auth.types';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { ZodValidationPipe } from '../../shared/validation/zod-validation.pipe';
import { Tag } from './tag.model';
import { CreateTagInput, createTagSchema } from './tags.schemas';
import { TagsService } from './tags.service';

@Controller('tags')
export class TagsController {
  constructor(
    private readonly pipeline: AccessPipelineService,
    private readonly tagsService: TagsService
  ) {}

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body(new ZodValidationPipe(createTagSchema)) body: CreateTagInput
  ): Promise<Tag> {
    return this.pipeline.execute(principal, 'tag.create', null, (tx) =>
      this.tagsService.create(tx, principal, body.name)
    );
  }

  @Get()
  list(@CurrentPrincipal() principal: Principal): Promise<Tag[]> {
    return this.pipeline.execute(principal, 'tag.read', null, (tx) =>
      this.tagsService.listByTenant(tx, principal.tenantId)
    );
  }
}
