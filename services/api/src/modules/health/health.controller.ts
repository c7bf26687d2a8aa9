import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SERVICE_VERSION } from '@depin-compat/shared';
import type { HealthResponse } from '@depin-compat/shared';
import { ProjectsService } from '../projects/projects.service';
import { SERVICE_STARTED_AT } from '../tokens';
import { formatUptime } from './uptime';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly projectsService: ProjectsService,
    @Inject(SERVICE_STARTED_AT) private readonly startedAt: Date,
  ) {}

  @Get()
  check(): HealthResponse {
    const now = new Date();
    return {
      status: 'healthy',
      version: SERVICE_VERSION,
      projects_loaded: this.projectsService.count(),
      uptime: formatUptime(now.getTime() - this.startedAt.getTime()),
      timestamp: now.toISOString(),
    };
  }
}
