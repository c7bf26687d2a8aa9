import { Inject, Injectable } from '@nestjs/common';
import pino from 'pino';
import { APP_CONFIG } from '../config/app-config';
import type { AppConfig } from '../config/app-config';

@Injectable()
export class LoggerService {
  private readonly logger: pino.Logger;

  constructor(@Inject(APP_CONFIG) config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>) {
    this.logger = pino({
      level: config.logLevel,
      base: {
        service: 'depin-compat-api',
        env: config.nodeEnv,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  info(message: string, context?: Record<string, unknown>) {
    this.logger.info(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.logger.error(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.logger.warn(context ?? {}, message);
  }
}

export type Logger = Pick<LoggerService, 'info' | 'warn' | 'error'>;
