import type { SystemRating, SystemSpec } from '@depin-compat/shared';

function cpuPoints(cores: number): number {
  if (cores >= 12) return 3;
  if (cores >= 8) return 2;
  if (cores >= 4) return 1;
  return 0;
}

function ramPoints(ramGb: number): number {
  if (ramGb >= 32) return 3;
  if (ramGb >= 16) return 2;
  if (ramGb >= 8) return 1;
  return 0;
}

function gpuPoints(system: SystemSpec): number {
  if (!system.has_gpu) return 0;
  if (system.gpu_vram_gb >= 12) return 3;
  if (system.gpu_vram_gb >= 6) return 2;
  return 1;
}

function storagePoints(system: SystemSpec): number {
  if (system.has_ssd && system.storage_gb >= 1000) return 2;
  if (system.has_ssd || system.storage_gb >= 500) return 1;
  return 0;
}

function networkPoints(mbps: number): number {
  if (mbps >= 500) return 2;
  if (mbps >= 100) return 1;
  return 0;
}

export function systemPoints(system: SystemSpec): number {
  return (
    cpuPoints(system.cpu_cores) +
    ramPoints(system.ram_gb) +
    gpuPoints(system) +
    storagePoints(system) +
    networkPoints(system.network_mbps)
  );
}

/** Coarse capability tier of a machine, independent of any project. */
export function rateSystem(system: SystemSpec): SystemRating {
  const points = systemPoints(system);
  if (points >= 12) return 'Extreme';
  if (points >= 8) return 'High-End';
  if (points >= 5) return 'Mid-Range';
  return 'Entry Level';
}
