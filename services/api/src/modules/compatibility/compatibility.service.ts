import { Inject, Injectable } from '@nestjs/common';
import type { CompatibilityResult, PredictionResponse, SystemSpec } from '@depin-compat/shared';
import type { ProjectCatalog } from '../catalog/catalog-loader';
import { PROJECT_CATALOG } from '../tokens';
import { buildRecommendations } from './recommendations';
import { scoreProject } from './scorer';
import { rateSystem } from './system-rating';

export class EmptyCatalogError extends Error {
  constructor() {
    super('Compatibility prediction requires at least one catalog project');
    this.name = 'EmptyCatalogError';
  }
}

function byScoreDescending(a: CompatibilityResult, b: CompatibilityResult): number {
  return b.compatibility_score - a.compatibility_score;
}

@Injectable()
export class CompatibilityService {
  constructor(@Inject(PROJECT_CATALOG) private readonly catalog: ProjectCatalog) {
    if (catalog.length === 0) {
      throw new EmptyCatalogError();
    }
  }

  predict(system: SystemSpec, now: Date = new Date()): PredictionResponse {
    const compatible: CompatibilityResult[] = [];
    const incompatible: CompatibilityResult[] = [];
    let totalScore = 0;

    for (const project of this.catalog) {
      const result = scoreProject(system, project);
      (result.compatible ? compatible : incompatible).push(result);
      totalScore += result.compatibility_score;
    }

    // Array#sort is stable, so equal scores keep catalog order.
    compatible.sort(byScoreDescending);
    incompatible.sort(byScoreDescending);

    const totalProjects = this.catalog.length;

    return {
      compatible_projects: compatible,
      incompatible_projects: incompatible,
      summary: {
        total_projects: totalProjects,
        compatible_count: compatible.length,
        incompatible_count: incompatible.length,
        compatibility_rate: (compatible.length / totalProjects) * 100,
        average_score: totalScore / totalProjects,
        system_rating: rateSystem(system),
      },
      recommendations: buildRecommendations(compatible, incompatible, totalProjects),
      generated_at: now.toISOString(),
    };
  }
}
