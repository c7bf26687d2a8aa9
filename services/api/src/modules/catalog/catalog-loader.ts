import fs from 'node:fs';
import { parse } from 'csv-parse/sync';
import { ALL_OPERATING_SYSTEMS, ProjectRequirement, projectRequirementSchema } from '@depin-compat/shared';
import type { Logger } from '../../common/logger.service';

export type ProjectCatalog = readonly Readonly<ProjectRequirement>[];

export class CatalogLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

type FieldMap = Map<string, number>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUTHY = new Set(['TRUE', '1', 'YES', 'Y']);

export function normalizeHeader(field: string): string {
  return field.trim().toLowerCase().replace(/ /g, '_');
}

function createFieldMap(header: string[]): FieldMap {
  const fieldMap: FieldMap = new Map();
  header.forEach((field, index) => fieldMap.set(normalizeHeader(field), index));
  return fieldMap;
}

function cell(record: string[], fieldMap: FieldMap, name: string): string | undefined {
  const index = fieldMap.get(name);
  if (index === undefined || index >= record.length) {
    return undefined;
  }
  return record[index];
}

function stringField(record: string[], fieldMap: FieldMap, ...names: string[]): string {
  for (const name of names) {
    const value = cell(record, fieldMap, name)?.trim();
    if (value) {
      return value;
    }
  }
  return '';
}

function intField(record: string[], fieldMap: FieldMap, ...names: string[]): number {
  for (const name of names) {
    const value = cell(record, fieldMap, name)?.trim();
    if (value && INTEGER_PATTERN.test(value)) {
      return Number.parseInt(value, 10);
    }
  }
  return 0;
}

// The first alias whose column exists decides, even when the cell is blank.
function boolField(record: string[], fieldMap: FieldMap, ...names: string[]): boolean {
  for (const name of names) {
    const value = cell(record, fieldMap, name);
    if (value !== undefined) {
      return TRUTHY.has(value.trim().toUpperCase());
    }
  }
  return false;
}

export function inferCostCategory(estimatedCostMax: number): string {
  if (estimatedCostMax <= 20) {
    return 'Low';
  }
  if (estimatedCostMax <= 100) {
    return 'Medium';
  }
  return 'High';
}

function validateRanges(project: ProjectRequirement): string | null {
  if (project.cpu_cores_min < 0 || project.cpu_cores_min > 64) {
    return `invalid CPU cores minimum: ${project.cpu_cores_min}`;
  }
  if (project.ram_gb_min < 0 || project.ram_gb_min > 1024) {
    return `invalid RAM minimum: ${project.ram_gb_min}`;
  }
  if (project.storage_gb_min < 0 || project.storage_gb_min > 100000) {
    return `invalid storage minimum: ${project.storage_gb_min}`;
  }
  if (project.network_mbps_min < 0 || project.network_mbps_min > 100000) {
    return `invalid network speed minimum: ${project.network_mbps_min}`;
  }
  return null;
}

/**
 * Maps one CSV row onto a project record, applying catalog defaults.
 * Throws when the row has no name or a requirement outside its plausible range.
 */
export function parseProjectRecord(record: string[], fieldMap: FieldMap): ProjectRequirement {
  const name = stringField(record, fieldMap, 'project_name', 'name');
  if (!name) {
    throw new Error('project name is required');
  }

  const estimatedCostMax = intField(record, fieldMap, 'estimated_monthly_cost_usd_max', 'cost_max');
  const project: ProjectRequirement = {
    name,
    type: stringField(record, fieldMap, 'project_type', 'type') || 'Unknown',
    node_type: stringField(record, fieldMap, 'node_type') || 'Standard',
    cpu_cores_min: intField(record, fieldMap, 'cpu_cores_min'),
    ram_gb_min: intField(record, fieldMap, 'ram_gb_min', 'ram_min_gb'),
    ram_gb_recommended: intField(record, fieldMap, 'ram_gb_recommended', 'ram_recommended_gb'),
    storage_gb_min: intField(record, fieldMap, 'storage_gb_min', 'storage_min_gb'),
    storage_type: stringField(record, fieldMap, 'storage_type') || 'Any',
    gpu_required: boolField(record, fieldMap, 'gpu_required'),
    gpu_vram_gb_min: intField(record, fieldMap, 'gpu_vram_gb_min', 'gpu_vram_min_gb'),
    network_mbps_min: intField(record, fieldMap, 'network_speed_mbps_min', 'network_mbps_min'),
    supported_os: stringField(record, fieldMap, 'supported_os', 'os_support') || ALL_OPERATING_SYSTEMS,
    estimated_cost_min: intField(record, fieldMap, 'estimated_monthly_cost_usd_min', 'cost_min'),
    estimated_cost_max: estimatedCostMax,
    cost_category: stringField(record, fieldMap, 'cost_category') || inferCostCategory(estimatedCostMax),
    home_friendly: boolField(record, fieldMap, 'home_friendly'),
    description: stringField(record, fieldMap, 'description', 'additional_requirements'),
  };

  const rangeIssue = validateRanges(project);
  if (rangeIssue) {
    throw new Error(`validation failed: ${rangeIssue}`);
  }

  return projectRequirementSchema.parse(project);
}

export function parseProjectCatalog(content: string, logger: Logger): ProjectCatalog {
  let rows: string[][];
  try {
    rows = parse(content, {
      relax_column_count: true,
      skip_empty_lines: true,
      bom: true,
    });
  } catch (error) {
    throw new CatalogLoadError(
      `failed to parse catalog CSV: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const [header, ...records] = rows;
  if (!header) {
    throw new CatalogLoadError('failed to read CSV header: catalog is empty');
  }

  const fieldMap = createFieldMap(header);
  const projects: Readonly<ProjectRequirement>[] = [];

  records.forEach((record, index) => {
    const lineNumber = index + 2;
    try {
      projects.push(Object.freeze(parseProjectRecord(record, fieldMap)));
    } catch (error) {
      logger.warn('Skipping catalog row', {
        line: lineNumber,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  });

  if (projects.length === 0) {
    throw new CatalogLoadError('no valid projects found in CSV file');
  }

  return Object.freeze(projects);
}

export function loadProjectCatalog(filePath: string, logger: Logger): ProjectCatalog {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CatalogLoadError(`failed to open CSV file '${filePath}'`, { cause: error });
  }

  const catalog = parseProjectCatalog(content, logger);
  logger.info('Project catalog loaded', { path: filePath, projects: catalog.length });
  return catalog;
}
