import { Controller, Get, Header, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SERVICE_VERSION } from '@depin-compat/shared';
import type { MetricsResponse } from '@depin-compat/shared';
import { ProjectsService } from '../projects/projects.service';
import { SERVICE_STARTED_AT } from '../tokens';
import { apiRegistry } from './metrics.registry';

@ApiTags('metrics')
@Controller('metrics')
export class MetricsController {
  constructor(
    private readonly projectsService: ProjectsService,
    @Inject(SERVICE_STARTED_AT) private readonly startedAt: Date,
  ) {}

  @Get()
  snapshot(): MetricsResponse {
    const now = Date.now();
    const summary = this.projectsService.getSummary();

    return {
      service_info: {
        name: 'depin_compatibility_api',
        version: SERVICE_VERSION,
        uptime_seconds: Math.max(0, (now - this.startedAt.getTime()) / 1000),
      },
      projects_loaded_total: this.projectsService.count(),
      projects_by_type: summary.by_type,
      projects_by_cost: summary.by_cost_category,
      projects_home_friendly: summary.home_friendly,
      projects_gpu_required: summary.gpu_required,
      timestamp: Math.floor(now / 1000),
    };
  }

  @Get('prometheus')
  @Header('Content-Type', apiRegistry.contentType)
  async prometheus(): Promise<string> {
    return apiRegistry.metrics();
  }
}
