import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import { Response } from 'express';
import { Public } from '../../shared/decorators/public.decorator';
import { PostgresService } from '../../shared/database/postgres.service';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';
import { MetricsService } from '../../shared/observability/metrics.service';

type HealthReport = {
  status: 'ok' | 'degraded';
  timestamp: string;
  db: 'up' | 'down';
  uptimeSeconds: number;
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly db: PostgresService,
    private readonly metrics: MetricsService,
    private readonly logger: StructuredLoggerService
  ) {}

  @Public()
  @Get()
  async check(@Res({ passthrough: true }) res: Response): Promise<HealthReport> {
    let dbStatus: 'up' | 'down' = 'up';

    try {
      await this.db.query('select 1');
    } catch (error) {
      dbStatus = 'down';
      this.logger.error(
        { type: 'health_db_down', message: error instanceof Error ? error.message : String(error) },
        undefined,
        'HealthController'
      );
    }

    if (dbStatus === 'down') {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }

    return {
      status: dbStatus === 'up' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      db: dbStatus,
      uptimeSeconds: this.metrics.snapshot().uptimeSeconds
    };
  }
}
