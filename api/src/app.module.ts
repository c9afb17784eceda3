import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { AuditController } from './modules/audit/audit.controller';
import { AuditService } from './modules/audit/audit.service';
import { AuthController } from './modules/auth/auth.controller';
import { AuthService } from './modules/auth/auth.service';
import { HealthController } from './modules/health/health.controller';
import { MetricsController } from './modules/metrics/metrics.controller';
import { OrganizationsController } from './modules/organizations/organizations.controller';
import { OrganizationsService } from './modules/organizations/organizations.service';
import { ProjectsController } from './modules/projects/projects.controller';
import { ProjectsService } from './modules/projects/projects.service';
import { TagsController } from './modules/tags/tags.controller';
import { TagsService } from './modules/tags/tags.service';
import { UsersController } from './modules/users/users.controller';
import { UsersService } from './modules/users/users.service';
import { AccessPipelineService } from './shared/auth/access-pipeline.service';
import { PasswordHasherService } from './shared/auth/password-hasher.service';
import { PrincipalResolverService } from './shared/auth/principal-resolver.service';
import { TokenService } from './shared/auth/token.service';
import { APP_CONFIG, loadAppConfig } from './shared/config/app-config';
import { PostgresService } from './shared/database/postgres.service';
import { ResourceMetaRepository } from './shared/database/resource-meta.repository';
import { JwtAuthGuard } from './shared/guards/jwt-auth.guard';
import { HttpLoggingInterceptor } from './shared/interceptors/http-logging.interceptor';
import { ResponseEnvelopeInterceptor } from './shared/interceptors/response-envelope.interceptor';
import { StructuredLoggerService } from './shared/logging/structured-logger.service';
import { RequestContextMiddleware } from './shared/middleware/request-context.middleware';
import { MetricsService } from './shared/observability/metrics.service';
import { RequestLoggingMiddleware } from './shared/observability/request-logging.middleware';

@Module({
  imports: [],
  controllers: [
    HealthController,
    MetricsController,
    AuthController,
    OrganizationsController,
    UsersController,
    ProjectsController,
    TagsController,
    AuditController
  ],
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => loadAppConfig(process.env)
    },
    StructuredLoggerService,
    PostgresService,
    MetricsService,
    PasswordHasherService,
    TokenService,
    PrincipalResolverService,
    ResourceMetaRepository,
    AccessPipelineService,
    AuditService,
    AuthService,
    OrganizationsService,
    UsersService,
    ProjectsService,
    TagsService,
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: HttpLoggingInterceptor
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: ResponseEnvelopeInterceptor
    }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(RequestContextMiddleware, RequestLoggingMiddleware)
      .forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
