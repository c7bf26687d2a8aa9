import { Inject, Injectable } from '@nestjs/common';
import type { ProjectsResponse, ProjectSummary } from '@depin-compat/shared';
import type { ProjectCatalog } from '../catalog/catalog-loader';
import { PROJECT_CATALOG } from '../tokens';

@Injectable()
export class ProjectsService {
  constructor(@Inject(PROJECT_CATALOG) private readonly catalog: ProjectCatalog) {}

  count(): number {
    return this.catalog.length;
  }

  getSummary(): ProjectSummary {
    const byType = new Map<string, number>();
    const byCostCategory = new Map<string, number>();
    let homeFriendly = 0;
    let gpuRequired = 0;

    for (const project of this.catalog) {
      byType.set(project.type, (byType.get(project.type) ?? 0) + 1);
      byCostCategory.set(project.cost_category, (byCostCategory.get(project.cost_category) ?? 0) + 1);

      if (project.home_friendly) {
        homeFriendly += 1;
      }
      if (project.gpu_required) {
        gpuRequired += 1;
      }
    }

    // Object.fromEntries defines own properties, so names like "__proto__" survive.
    return {
      by_type: Object.fromEntries(byType),
      by_cost_category: Object.fromEntries(byCostCategory),
      home_friendly: homeFriendly,
      gpu_required: gpuRequired,
    };
  }

  listProjects(): ProjectsResponse {
    return {
      projects: [...this.catalog],
      total: this.catalog.length,
      summary: this.getSummary(),
    };
  }
}
