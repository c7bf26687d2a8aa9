import type { ProjectRequirement } from '@depin-compat/shared';
import { describe, expect, it } from 'vitest';
import {
  HOME_USE_WARNING,
  isOsSupported,
  performanceBonus,
  performanceRating,
  scoreProject,
} from '../src/modules/compatibility/scorer';
import { makeProject, makeSystem } from './fixtures';

describe('scoreProject', () => {
  it('marks a comfortably specced system as fully compatible', () => {
    const result = scoreProject(makeSystem(), makeProject());

    expect(result.compatible).toBe(true);
    expect(result.missing_requirements).toEqual([]);
    expect(result.recommended_upgrades).toEqual([]);
    expect(result.compatibility_score).toBe(1);
    expect(result.performance_rating).toBe('Excellent');
    expect(result.estimated_cost).toBe('$10-$30/month');
  });

  it('accumulates every failing dimension and clamps the score at zero', () => {
    const system = makeSystem({
      cpu_cores: 2,
      ram_gb: 4,
      storage_gb: 100,
      has_ssd: false,
      has_gpu: false,
      gpu_vram_gb: 0,
      network_mbps: 10,
    });
    const project = makeProject({
      cpu_cores_min: 8,
      ram_gb_min: 16,
      ram_gb_recommended: 32,
      storage_gb_min: 1000,
      gpu_required: true,
      gpu_vram_gb_min: 8,
      network_mbps_min: 200,
      supported_os: 'Linux',
    });

    const result = scoreProject(system, project);

    expect(result.compatible).toBe(false);
    expect(result.missing_requirements).toEqual([
      'CPU cores: need 8, have 2',
      'RAM: need 16GB, have 4GB',
      'Storage: need 1000GB, have 100GB',
      'SSD storage required',
      'Dedicated GPU required',
      'Network speed: need 200Mbps, have 10Mbps',
      'OS not supported: need one of [Linux], have Windows',
    ]);
    expect(result.compatibility_score).toBe(0);
    expect(result.performance_rating).toBe('Poor');
  });

  it('treats an empty supported_os as unrestricted', () => {
    for (const os of ['Windows', 'Linux', 'macOS'] as const) {
      const result = scoreProject(makeSystem({ os }), makeProject({ supported_os: '' }));
      expect(result.missing_requirements).toEqual([]);
    }
  });

  it('scores exactly-met minimums at 1.0 without bonuses', () => {
    const system = makeSystem({
      cpu_cores: 4,
      ram_gb: 8,
      storage_gb: 500,
      has_ssd: false,
      has_gpu: false,
      gpu_vram_gb: 0,
      network_mbps: 50,
      os: 'Linux',
    });
    const project = makeProject({
      cpu_cores_min: 4,
      ram_gb_min: 8,
      ram_gb_recommended: 8,
      storage_gb_min: 500,
      storage_type: 'Any',
      network_mbps_min: 50,
      supported_os: 'Linux',
    });

    const result = scoreProject(system, project);

    expect(result.compatible).toBe(true);
    expect(result.compatibility_score).toBe(1);
    expect(result.performance_rating).toBe('Excellent');
  });

  it('suggests a RAM upgrade without failing when only the recommendation is missed', () => {
    const system = makeSystem({ ram_gb: 12, cpu_cores: 4, network_mbps: 20, has_gpu: false, gpu_vram_gb: 0 });
    const project = makeProject({ storage_type: 'Any' });

    const result = scoreProject(system, project);

    expect(result.compatible).toBe(true);
    expect(result.recommended_upgrades).toEqual(['RAM upgrade to 16GB recommended for optimal performance']);
    expect(result.compatibility_score).toBeCloseTo(0.9, 10);
    expect(result.performance_rating).toBe('Excellent');
  });

  it('checks VRAM only when the GPU presence check passes', () => {
    const withoutGpu = scoreProject(
      makeSystem({ has_gpu: false, gpu_vram_gb: 0 }),
      makeProject({ gpu_required: true, gpu_vram_gb_min: 12 }),
    );
    expect(withoutGpu.missing_requirements).toEqual(['Dedicated GPU required']);

    const smallGpu = scoreProject(
      makeSystem({ has_gpu: true, gpu_vram_gb: 6 }),
      makeProject({ gpu_required: true, gpu_vram_gb_min: 12 }),
    );
    expect(smallGpu.missing_requirements).toEqual(['GPU VRAM: need 12GB, have 6GB']);
    expect(smallGpu.compatible).toBe(false);
  });

  it('matches operating systems exactly after trimming', () => {
    expect(isOsSupported('macOS', 'Linux, macOS')).toBe(true);
    expect(isOsSupported('macos', 'Linux,macOS')).toBe(false);
    expect(isOsSupported('Windows', 'Linux')).toBe(false);
  });

  it('warns about projects that are not home friendly without touching the score', () => {
    const friendly = scoreProject(makeSystem(), makeProject());
    const datacenter = scoreProject(makeSystem(), makeProject({ home_friendly: false }));

    expect(friendly.warnings).toEqual([]);
    expect(datacenter.warnings).toEqual([HOME_USE_WARNING]);
    expect(datacenter.compatibility_score).toBe(friendly.compatibility_score);
    expect(datacenter.compatible).toBe(true);
  });

  it('keeps a partial score for an incompatible project', () => {
    const result = scoreProject(makeSystem({ network_mbps: 10 }), makeProject({ storage_type: 'Any' }));

    expect(result.compatible).toBe(false);
    // 1 - 0.2 (network) + 0.02 (cpu above minimum)
    expect(result.compatibility_score).toBeCloseTo(0.82, 10);
    expect(result.performance_rating).toBe('Good');
  });

  type SweptResource = 'cpu_cores' | 'ram_gb' | 'storage_gb' | 'network_mbps';

  const sweeps: Array<{ resource: SweptResource; project: ProjectRequirement; values: number[] }> = [
    {
      resource: 'cpu_cores',
      project: makeProject({ cpu_cores_min: 16, storage_type: 'Any', supported_os: 'Linux' }),
      values: [1, 4, 8, 15, 16, 17, 32, 33, 64],
    },
    {
      resource: 'ram_gb',
      project: makeProject({ ram_gb_min: 16, ram_gb_recommended: 32, storage_type: 'Any', supported_os: 'Linux' }),
      values: [1, 8, 15, 16, 31, 32, 33, 64, 65, 128],
    },
    {
      resource: 'storage_gb',
      project: makeProject({ storage_gb_min: 1000, storage_type: 'Any', supported_os: 'Linux' }),
      values: [32, 500, 999, 1000, 1001, 4096, 8192],
    },
    {
      resource: 'network_mbps',
      project: makeProject({ network_mbps_min: 50, storage_type: 'Any', supported_os: 'Linux' }),
      values: [1, 49, 50, 100, 101, 1000, 10000],
    },
  ];

  it.each(sweeps)('never decreases the score as $resource grows', ({ resource, project, values }) => {
    const scores = values.map((value) => {
      const system = makeSystem();
      system[resource] = value;
      return scoreProject(system, project).compatibility_score;
    });

    scores.forEach((score, index) => {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
      if (index > 0) {
        expect(score).toBeGreaterThanOrEqual(scores[index - 1]);
      }
    });
    expect(scores[scores.length - 1]).toBeGreaterThan(scores[0]);
  });

  it('raises the score across the RAM minimum and recommended boundaries', () => {
    const project = makeProject({ ram_gb_min: 16, ram_gb_recommended: 32, storage_type: 'Any', supported_os: 'Linux' });
    const scoreAt = (ram_gb: number) => scoreProject(makeSystem({ ram_gb }), project).compatibility_score;

    // 1 - 0.3 (OS) + 0.02 (cpu) + 0.03 (network), then the RAM term
    expect(scoreAt(15)).toBeCloseTo(0.45, 10);
    expect(scoreAt(16)).toBeCloseTo(0.65, 10);
    expect(scoreAt(32)).toBeCloseTo(0.75, 10);
    expect(scoreAt(33)).toBeCloseTo(0.77, 10);
    expect(scoreAt(65)).toBeCloseTo(0.8, 10);
  });
});

describe('performanceBonus', () => {
  it('caps the combined bonus at 0.15', () => {
    const system = makeSystem({ cpu_cores: 64, ram_gb: 128, network_mbps: 10000, has_gpu: true, gpu_vram_gb: 24 });
    const project = makeProject({ cpu_cores_min: 1, ram_gb_recommended: 2, network_mbps_min: 1 });

    expect(performanceBonus(system, project)).toBe(0.15);
  });

  it('uses the smaller step when a resource is above but not double the requirement', () => {
    const system = makeSystem({ cpu_cores: 6, ram_gb: 20, network_mbps: 30, has_gpu: false });
    const project = makeProject({ cpu_cores_min: 4, ram_gb_recommended: 16, network_mbps_min: 20 });

    expect(performanceBonus(system, project)).toBeCloseTo(0.04, 10);
  });
});

describe('performanceRating', () => {
  it('maps score bands onto ratings', () => {
    expect(performanceRating(1)).toBe('Excellent');
    expect(performanceRating(0.9)).toBe('Excellent');
    expect(performanceRating(0.89)).toBe('Good');
    expect(performanceRating(0.7)).toBe('Good');
    expect(performanceRating(0.69)).toBe('Fair');
    expect(performanceRating(0.5)).toBe('Fair');
    expect(performanceRating(0.49)).toBe('Poor');
    expect(performanceRating(0)).toBe('Poor');
  });
});
