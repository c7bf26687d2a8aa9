import type { CompatibilityResult } from '@depin-compat/shared';

type UpgradeCategory = 'ram' | 'cpu' | 'gpu' | 'storage' | 'network';

// Order matters: a requirement is counted under the first category it matches,
// so "GPU VRAM: ..." lands under RAM.
const CATEGORY_MATCHERS: ReadonlyArray<readonly [UpgradeCategory, readonly string[]]> = [
  ['ram', ['RAM']],
  ['cpu', ['CPU']],
  ['gpu', ['GPU']],
  ['storage', ['Storage', 'SSD']],
  ['network', ['Network']],
];

export const UPGRADE_MESSAGES: Record<UpgradeCategory, string> = {
  ram: '💾 Consider upgrading RAM for better project compatibility',
  cpu: '🖥️ A CPU upgrade would significantly improve project support',
  gpu: '🎮 Adding a dedicated GPU would unlock AI and compute-intensive projects',
  storage: '💿 Consider upgrading to SSD storage or increasing capacity',
  network: '🌐 Faster internet connection would improve project compatibility',
};

export const OVERALL_MESSAGES = {
  excellent: '🎉 Excellent! Your system is compatible with most DePIN projects.',
  good: '👍 Good compatibility! Your system works well with many DePIN projects.',
  fair: '⚠️ Fair compatibility. Consider upgrading for better project support.',
  limited: '📈 Limited compatibility. Upgrades recommended for better DePIN support.',
} as const;

const TOP_PROJECT_COUNT = 3;

export function overallAssessment(compatibleFraction: number): string {
  if (compatibleFraction >= 0.8) return OVERALL_MESSAGES.excellent;
  if (compatibleFraction >= 0.6) return OVERALL_MESSAGES.good;
  if (compatibleFraction >= 0.4) return OVERALL_MESSAGES.fair;
  return OVERALL_MESSAGES.limited;
}

export function classifyRequirement(requirement: string): UpgradeCategory | null {
  for (const [category, needles] of CATEGORY_MATCHERS) {
    if (needles.some((needle) => requirement.includes(needle))) {
      return category;
    }
  }
  return null;
}

export function upgradeNeeds(incompatible: readonly CompatibilityResult[]): string[] {
  const counts: Record<UpgradeCategory, number> = { ram: 0, cpu: 0, gpu: 0, storage: 0, network: 0 };

  for (const result of incompatible) {
    for (const requirement of result.missing_requirements) {
      const category = classifyRequirement(requirement);
      if (category) {
        counts[category] += 1;
      }
    }
  }

  const threshold = Math.floor(incompatible.length / 3);
  return CATEGORY_MATCHERS.filter(([category]) => counts[category] > threshold).map(
    ([category]) => UPGRADE_MESSAGES[category],
  );
}

/**
 * Builds the ordered recommendation list. `compatible` must already be sorted
 * by descending score; `totalProjects` must be positive.
 */
export function buildRecommendations(
  compatible: readonly CompatibilityResult[],
  incompatible: readonly CompatibilityResult[],
  totalProjects: number,
): string[] {
  const recommendations = [overallAssessment(compatible.length / totalProjects), ...upgradeNeeds(incompatible)];

  if (compatible.length > 0) {
    const names = compatible.slice(0, TOP_PROJECT_COUNT).map((result) => result.name);
    recommendations.push(`🚀 Recommended projects for your system: ${names.join(', ')}`);
  }

  return recommendations;
}
