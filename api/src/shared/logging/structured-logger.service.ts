import { Inject, Injectable, LoggerService } from '@nestjs/common';
import { APP_CONFIG, AppConfig, LogLevel } from '../config/app-config';

type WrittenLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  log: 20,
  warn: 30,
  error: 40,
  silent: 100
};

@Injectable()
export class StructuredLoggerService implements LoggerService {
  private readonly threshold: number;

  constructor(@Inject(APP_CONFIG) config: Pick<AppConfig, 'logLevel'>) {
    this.threshold = SEVERITY[config.logLevel];
  }

  log(message: unknown, context?: string): void {
    this.write('log', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  private write(level: WrittenLevel, message: unknown, context?: string, trace?: string): void {
    if (SEVERITY[level] < this.threshold) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      context: context ?? 'api',
      message,
      trace
    };

    if (level === 'error' || level === 'warn') {
      console.error(JSON.stringify(payload));
      return;
    }

    console.log(JSON.stringify(payload));
  }
}
