import { Controller, Get } from '@nestjs/common';
import { Public } from '../../shared/decorators/public.decorator';
import { PlainResponse } from '../../shared/decorators/plain-response.decorator';
import { AuthOutcome, MetricsService } from '../../shared/observability/metrics.service';

@Public()
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get('json')
  json(): ReturnType<MetricsService['snapshot']> {
    return this.metrics.snapshot();
  }

  // 401/403/404 counts; a jump in forbidden usually means a client is probing other tenants.
  @Get('auth')
  authOutcomes(): Record<AuthOutcome, number> {
    return this.metrics.snapshot().authOutcomes;
  }

  @Get()
  @PlainResponse('text/plain; version=0.0.4')
  prometheus(): string {
    return this.metrics.toPrometheus();
  }
}
