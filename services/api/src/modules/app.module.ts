import { DynamicModule, Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { HttpErrorFilter } from '../common/http-error.filter';
import { LoggerService } from '../common/logger.service';
import { RateLimitGuard } from '../common/rate-limit.guard';
import { createRateLimiter } from '../common/rate-limiter';
import { APP_CONFIG } from '../config/app-config';
import type { AppConfig } from '../config/app-config';
import type { ProjectCatalog } from './catalog/catalog-loader';
import { CompatibilityController } from './compatibility/compatibility.controller';
import { CompatibilityService } from './compatibility/compatibility.service';
import { DocsController } from './docs/docs.controller';
import { HealthController } from './health/health.controller';
import { MetricsController } from './metrics/metrics.controller';
import { ProjectsController } from './projects/projects.controller';
import { ProjectsService } from './projects/projects.service';
import { PROJECT_CATALOG, RATE_LIMITER, SERVICE_STARTED_AT } from './tokens';

export interface AppModuleOptions {
  config: AppConfig;
  catalog: ProjectCatalog;
  logger: LoggerService;
  startedAt?: Date;
}

@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions): DynamicModule {
    return {
      module: AppModule,
      controllers: [
        DocsController,
        HealthController,
        ProjectsController,
        CompatibilityController,
        MetricsController,
      ],
      providers: [
        { provide: APP_CONFIG, useValue: options.config },
        { provide: LoggerService, useValue: options.logger },
        { provide: PROJECT_CATALOG, useValue: options.catalog },
        { provide: SERVICE_STARTED_AT, useValue: options.startedAt ?? new Date() },
        {
          provide: RATE_LIMITER,
          useFactory: () => createRateLimiter(options.config.rateLimit.max, options.config.rateLimit.windowMs),
        },
        { provide: APP_GUARD, useClass: RateLimitGuard },
        { provide: APP_FILTER, useFactory: (logger: LoggerService) => new HttpErrorFilter(logger), inject: [LoggerService] },
        ProjectsService,
        CompatibilityService,
      ],
    };
  }
}
