import type { ProjectRequirement, SystemSpec } from '@depin-compat/shared';

export function makeSystem(overrides: Partial<SystemSpec> = {}): SystemSpec {
  return {
    cpu_cores: 8,
    ram_gb: 16,
    storage_gb: 512,
    has_ssd: true,
    has_gpu: true,
    gpu_vram_gb: 8,
    network_mbps: 100,
    os: 'Windows',
    ...overrides,
  };
}

export function makeProject(overrides: Partial<ProjectRequirement> = {}): ProjectRequirement {
  return {
    name: 'Test Project',
    type: 'Compute',
    node_type: 'Standard',
    cpu_cores_min: 4,
    ram_gb_min: 8,
    ram_gb_recommended: 16,
    storage_gb_min: 500,
    storage_type: 'SSD',
    gpu_required: false,
    gpu_vram_gb_min: 0,
    network_mbps_min: 20,
    supported_os: 'Linux,Windows,macOS',
    estimated_cost_min: 10,
    estimated_cost_max: 30,
    cost_category: 'Low',
    home_friendly: true,
    description: 'fixture project',
    ...overrides,
  };
}
