import type {
  CompatibilityResult,
  PerformanceRating,
  ProjectRequirement,
  SystemSpec,
} from '@depin-compat/shared';

export const HOME_USE_WARNING = 'This project may not be suitable for home use';

const MAX_PERFORMANCE_BONUS = 0.15;

export const PERFORMANCE_THRESHOLDS: ReadonlyArray<readonly [number, PerformanceRating]> = [
  [0.9, 'Excellent'],
  [0.7, 'Good'],
  [0.5, 'Fair'],
];

/** What a single requirement dimension contributes to a project's score. */
export interface DimensionOutcome {
  scoreDelta: number;
  missing?: string;
  upgrade?: string;
}

export type DimensionCheck = (system: SystemSpec, project: ProjectRequirement) => DimensionOutcome | null;

interface ScoreAccumulator {
  score: number;
  compatible: boolean;
  missingRequirements: string[];
  recommendedUpgrades: string[];
}

export function isOsSupported(os: string, supportedOs: string): boolean {
  if (supportedOs === '') {
    return true;
  }
  return supportedOs.split(',').some((entry) => entry.trim() === os);
}

const checkCpu: DimensionCheck = (system, project) =>
  system.cpu_cores < project.cpu_cores_min
    ? {
        scoreDelta: -0.3,
        missing: `CPU cores: need ${project.cpu_cores_min}, have ${system.cpu_cores}`,
      }
    : null;

const checkRam: DimensionCheck = (system, project) => {
  if (system.ram_gb < project.ram_gb_min) {
    return {
      scoreDelta: -0.3,
      missing: `RAM: need ${project.ram_gb_min}GB, have ${system.ram_gb}GB`,
    };
  }
  if (system.ram_gb < project.ram_gb_recommended) {
    return {
      scoreDelta: -0.1,
      upgrade: `RAM upgrade to ${project.ram_gb_recommended}GB recommended for optimal performance`,
    };
  }
  return null;
};

const checkStorageCapacity: DimensionCheck = (system, project) =>
  system.storage_gb < project.storage_gb_min
    ? {
        scoreDelta: -0.2,
        missing: `Storage: need ${project.storage_gb_min}GB, have ${system.storage_gb}GB`,
      }
    : null;

const checkStorageType: DimensionCheck = (system, project) => {
  if (project.storage_type !== 'SSD') {
    return null;
  }
  return system.has_ssd ? { scoreDelta: 0.05 } : { scoreDelta: -0.25, missing: 'SSD storage required' };
};

// VRAM is only compared once the GPU presence check has passed.
const checkGpu: DimensionCheck = (system, project) => {
  if (project.gpu_required && !system.has_gpu) {
    return { scoreDelta: -0.4, missing: 'Dedicated GPU required' };
  }
  if (project.gpu_vram_gb_min > 0 && system.gpu_vram_gb < project.gpu_vram_gb_min) {
    return {
      scoreDelta: -0.3,
      missing: `GPU VRAM: need ${project.gpu_vram_gb_min}GB, have ${system.gpu_vram_gb}GB`,
    };
  }
  return null;
};

const checkNetwork: DimensionCheck = (system, project) =>
  system.network_mbps < project.network_mbps_min
    ? {
        scoreDelta: -0.2,
        missing: `Network speed: need ${project.network_mbps_min}Mbps, have ${system.network_mbps}Mbps`,
      }
    : null;

const checkOs: DimensionCheck = (system, project) =>
  isOsSupported(system.os, project.supported_os)
    ? null
    : {
        scoreDelta: -0.3,
        missing: `OS not supported: need one of [${project.supported_os}], have ${system.os}`,
      };

export const DIMENSION_CHECKS: readonly DimensionCheck[] = [
  checkCpu,
  checkRam,
  checkStorageCapacity,
  checkStorageType,
  checkGpu,
  checkNetwork,
  checkOs,
];

export function performanceBonus(system: SystemSpec, project: ProjectRequirement): number {
  let bonus = 0;

  if (system.cpu_cores > project.cpu_cores_min * 2) {
    bonus += 0.05;
  } else if (system.cpu_cores > project.cpu_cores_min) {
    bonus += 0.02;
  }

  if (system.ram_gb > project.ram_gb_recommended * 2) {
    bonus += 0.05;
  } else if (system.ram_gb > project.ram_gb_recommended) {
    bonus += 0.02;
  }

  if (system.network_mbps > project.network_mbps_min * 2) {
    bonus += 0.03;
  }

  if (system.has_gpu && system.gpu_vram_gb > 8) {
    bonus += 0.02;
  }

  return Math.min(bonus, MAX_PERFORMANCE_BONUS);
}

export function performanceRating(score: number): PerformanceRating {
  for (const [threshold, rating] of PERFORMANCE_THRESHOLDS) {
    if (score >= threshold) {
      return rating;
    }
  }
  return 'Poor';
}

export function formatEstimatedCost(project: Pick<ProjectRequirement, 'estimated_cost_min' | 'estimated_cost_max'>): string {
  return `$${project.estimated_cost_min}-$${project.estimated_cost_max}/month`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Scores one project against a system. Every dimension is evaluated and all
 * penalties accumulate; only the final clamp to [0, 1] is nonlinear, so an
 * incompatible project can still carry a nonzero score.
 */
export function scoreProject(system: SystemSpec, project: ProjectRequirement): CompatibilityResult {
  const accumulated = DIMENSION_CHECKS.reduce<ScoreAccumulator>(
    (acc, check) => {
      const outcome = check(system, project);
      if (!outcome) {
        return acc;
      }
      return {
        score: acc.score + outcome.scoreDelta,
        compatible: acc.compatible && outcome.missing === undefined,
        missingRequirements: outcome.missing
          ? [...acc.missingRequirements, outcome.missing]
          : acc.missingRequirements,
        recommendedUpgrades: outcome.upgrade
          ? [...acc.recommendedUpgrades, outcome.upgrade]
          : acc.recommendedUpgrades,
      };
    },
    { score: 1, compatible: true, missingRequirements: [], recommendedUpgrades: [] },
  );

  const score = clamp(accumulated.score + performanceBonus(system, project), 0, 1);

  return {
    name: project.name,
    compatible: accumulated.compatible,
    compatibility_score: score,
    performance_rating: performanceRating(score),
    estimated_cost: formatEstimatedCost(project),
    missing_requirements: accumulated.missingRequirements,
    recommended_upgrades: accumulated.recommendedUpgrades,
    warnings: project.home_friendly ? [] : [HOME_USE_WARNING],
  };
}
