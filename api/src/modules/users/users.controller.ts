import { Body, Controller, Get, Param, Patch, Post } from '@nestjs/common';
import { AccessPipelineService } from '../../shared/auth/access-pipeline.service';
import { Principal } from '../../shared/auth/auth.types';
import { CurrentPrincipal } from '../../shared/decorators/current-principal.decorator';
import { ZodValidationPipe } from '../../shared/validation/zod-validation.pipe';
import { User } from './user.model';
import {
  CreateUserInput,
  UpdateUserRoleInput,
  createUserSchema,
  updateUserRoleSchema
} from './users.schemas';
import { UsersService } from './users.service';

@Controller('users')
export class UsersController {
  constructor(
    private readonly pipeline: AccessPipelineService,
    private readonly usersService: UsersService
  ) {}

  @Post()
  create(
    @CurrentPrincipal() principal: Principal,
    @Body(new ZodValidationPipe(createUserSchema)) body: CreateUserInput
  ): Promise<User> {
    return this.pipeline.execute(principal, 'user.create', null, (tx) =>
      this.usersService.create(tx, principal, body)
    );
  }

  @Get()
  list(@CurrentPrincipal() principal: Principal): Promise<User[]> {
    return this.pipeline.execute(principal, 'user.read', null, (tx) =>
      this.usersService.listByTenant(tx, principal.tenantId)
    );
  }

  @Patch(':userId/role')
  updateRole(
    @CurrentPrincipal() principal: Principal,
    @Param('userId') userId: string,
    @Body(new ZodValidationPipe(updateUserRoleSchema)) body: UpdateUserRoleInput
  ): Promise<User> {
    return this.pipeline.execute(principal, 'user.update-role', userId, (tx) =>
      this.usersService.updateRole(tx, principal.tenantId, userId, body.role)
    );
  }
}
