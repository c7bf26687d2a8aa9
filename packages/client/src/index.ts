import axios, { AxiosInstance } from 'axios';
import {
  HealthResponse,
  MetricsResponse,
  PredictionResponse,
  ProjectsResponse,
  SystemSpecInput,
  errorResponseSchema,
  healthResponseSchema,
  metricsResponseSchema,
  predictionResponseSchema,
  projectsResponseSchema,
  systemSpecSchema,
} from '@depin-compat/shared';
import { z } from 'zod';

const DEFAULT_BASE_URL = process.env.DEPIN_API_BASE_URL ?? 'http://localhost:8080/api/v1';

export class DepinApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly detail?: string,
  ) {
    super(message);
    this.name = 'DepinApiError';
  }
}

export interface DepinCompatClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class DepinCompatClient {
  private readonly http: AxiosInstance;

  constructor(options: DepinCompatClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, ''),
        timeout: options.timeoutMs ?? 15000,
        headers: { 'User-Agent': 'depin-compat-client/1.0.0' },
      });
  }

  async health(): Promise<HealthResponse> {
    return this.request(healthResponseSchema, 'get', '/health');
  }

  async predict(system: SystemSpecInput): Promise<PredictionResponse> {
    const parsed = systemSpecSchema.safeParse(system);
    if (!parsed.success) {
      throw new DepinApiError(
        'Invalid system specifications',
        null,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      );
    }

    return this.request(predictionResponseSchema, 'post', '/predict', { system: parsed.data });
  }

  async listProjects(): Promise<ProjectsResponse> {
    return this.request(projectsResponseSchema, 'get', '/projects');
  }

  async metrics(): Promise<MetricsResponse> {
    return this.request(metricsResponseSchema, 'get', '/metrics');
  }

  async docs(): Promise<Record<string, unknown>> {
    return this.request(z.record(z.unknown()), 'get', '/docs');
  }

  private async request<TSchema extends z.ZodTypeAny>(
    schema: TSchema,
    method: 'get' | 'post',
    path: string,
    body?: unknown,
  ): Promise<z.infer<TSchema>> {
    let data: unknown;
    try {
      const response = method === 'get' ? await this.http.get(path) : await this.http.post(path, body);
      data = response.data;
    } catch (error) {
      throw this.toApiError(error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new DepinApiError(`Unexpected response shape from ${path}`, null, parsed.error.message);
    }
    return parsed.data;
  }

  private toApiError(error: unknown): DepinApiError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status ?? null;
      const body = errorResponseSchema.safeParse(error.response?.data);
      if (body.success) {
        return new DepinApiError(`HTTP ${status ?? 'error'}: ${body.data.error}`, status, body.data.message);
      }
      return new DepinApiError(`HTTP ${status ?? 'error'}: ${error.message}`, status);
    }

    return new DepinApiError(error instanceof Error ? error.message : String(error), null);
  }
}
