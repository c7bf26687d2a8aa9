import { z } from 'zod';

export const operatingSystemSchema = z.enum(['Windows', 'Linux', 'macOS']);

export const performanceRatingSchema = z.enum(['Excellent', 'Good', 'Fair', 'Poor']);

export const systemRatingSchema = z.enum(['Entry Level', 'Mid-Range', 'High-End', 'Extreme']);

export const systemSpecSchema = z.object({
  cpu_cores: z.number().int().min(1).max(64),
  ram_gb: z.number().int().min(1).max(128),
  storage_gb: z.number().int().min(32).max(8192),
  has_ssd: z.boolean().default(false),
  has_gpu: z.boolean().default(false),
  gpu_vram_gb: z.number().int().min(0).max(48).default(0),
  network_mbps: z.number().int().min(1).max(10000),
  os: operatingSystemSchema,
});

export const predictionRequestSchema = z.object({
  system: systemSpecSchema,
});

export const projectRequirementSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  node_type: z.string(),
  cpu_cores_min: z.number().int().min(0).max(64),
  ram_gb_min: z.number().int().min(0).max(1024),
  ram_gb_recommended: z.number().int(),
  storage_gb_min: z.number().int().min(0).max(100000),
  // Catalog text is kept verbatim; only "SSD" changes scoring.
  storage_type: z.string(),
  gpu_required: z.boolean(),
  gpu_vram_gb_min: z.number().int(),
  network_mbps_min: z.number().int().min(0).max(100000),
  supported_os: z.string(),
  estimated_cost_min: z.number().int(),
  estimated_cost_max: z.number().int(),
  cost_category: z.string(),
  home_friendly: z.boolean(),
  description: z.string(),
});

export const compatibilityResultSchema = z.object({
  name: z.string(),
  compatible: z.boolean(),
  compatibility_score: z.number().min(0).max(1),
  performance_rating: performanceRatingSchema,
  estimated_cost: z.string(),
  missing_requirements: z.array(z.string()),
  recommended_upgrades: z.array(z.string()),
  warnings: z.array(z.string()),
});

export const predictionSummarySchema = z.object({
  total_projects: z.number().int().positive(),
  compatible_count: z.number().int().nonnegative(),
  incompatible_count: z.number().int().nonnegative(),
  compatibility_rate: z.number().min(0).max(100),
  average_score: z.number().min(0).max(1),
  system_rating: systemRatingSchema,
});

export const predictionResponseSchema = z.object({
  compatible_projects: z.array(compatibilityResultSchema),
  incompatible_projects: z.array(compatibilityResultSchema),
  summary: predictionSummarySchema,
  recommendations: z.array(z.string()),
  generated_at: z.string(),
});

export const projectSummarySchema = z.object({
  by_type: z.record(z.number().int()),
  by_cost_category: z.record(z.number().int()),
  home_friendly: z.number().int().nonnegative(),
  gpu_required: z.number().int().nonnegative(),
});

export const projectsResponseSchema = z.object({
  projects: z.array(projectRequirementSchema),
  total: z.number().int().nonnegative(),
  summary: projectSummarySchema,
});

export const healthResponseSchema = z.object({
  status: z.literal('healthy'),
  version: z.string(),
  projects_loaded: z.number().int().nonnegative(),
  uptime: z.string(),
  timestamp: z.string(),
});

export const metricsResponseSchema = z.object({
  service_info: z.object({
    name: z.string(),
    version: z.string(),
    uptime_seconds: z.number().nonnegative(),
  }),
  projects_loaded_total: z.number().int().nonnegative(),
  projects_by_type: z.record(z.number().int()),
  projects_by_cost: z.record(z.number().int()),
  projects_home_friendly: z.number().int().nonnegative(),
  projects_gpu_required: z.number().int().nonnegative(),
  timestamp: z.number().int(),
});

export const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  code: z.number().int(),
  timestamp: z.string(),
  issues: z.array(z.unknown()).optional(),
});

export type OperatingSystem = z.infer<typeof operatingSystemSchema>;
export type PerformanceRating = z.infer<typeof performanceRatingSchema>;
export type SystemRating = z.infer<typeof systemRatingSchema>;
export type SystemSpec = z.infer<typeof systemSpecSchema>;
export type SystemSpecInput = z.input<typeof systemSpecSchema>;
export type PredictionRequest = z.infer<typeof predictionRequestSchema>;
export type ProjectRequirement = z.infer<typeof projectRequirementSchema>;
export type CompatibilityResult = z.infer<typeof compatibilityResultSchema>;
export type PredictionSummary = z.infer<typeof predictionSummarySchema>;
export type PredictionResponse = z.infer<typeof predictionResponseSchema>;
export type ProjectSummary = z.infer<typeof projectSummarySchema>;
export type ProjectsResponse = z.infer<typeof projectsResponseSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
export type MetricsResponse = z.infer<typeof metricsResponseSchema>;
export type ErrorResponse = z.infer<typeof errorResponseSchema>;
