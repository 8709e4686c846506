import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger';
import { ApiError, DecodeError, TransportError, errorMessage } from '../errors';
import {
  configsSchema,
  delaySchema,
  proxiesSchema,
  trafficSchema,
} from './schemas';
import type {
  ConfigsResponse,
  DelayResponse,
  PatchConfigsRequest,
  ProxiesResponse,
  SelectProxyRequest,
  TrafficResponse,
} from './schemas';

const DEFAULT_TIMEOUT = 5000;

export interface ControlApiOptions {
  host: string;
  port: number;
  secret?: string;
  timeoutMs?: number;
}

export interface RequestOptions {
  timeoutMs?: number;
}

export interface DelayProbeOptions {
  timeoutMs: number;
  url: string;
}

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Typed client for the proxy core's loopback HTTP control API.
 *
 * Every call is bounded by a timeout and none is retried; callers own
 * their retry and polling policy.
 */
export class ControlApiClient {
  private baseUrl: string;
  private secret: string;
  private timeoutMs: number;

  constructor(options: ControlApiOptions) {
    this.baseUrl = `http://${options.host}:${options.port}`;
    this.secret = options.secret || '';
    this.timeoutMs = options.timeoutMs || DEFAULT_TIMEOUT;
  }

  get address(): string {
    return this.baseUrl.replace('http://', '');
  }

  async get<T>(endpoint: string, schema: Schema<T>, options?: RequestOptions): Promise<T> {
    const rawText = await this.request('GET', endpoint, undefined, options);

    let body: unknown;
    try {
      body = JSON.parse(rawText);
    } catch {
      logger.error({
        module: 'clients.controlApi',
        endpoint,
        raw_body: rawText.substring(0, 200),
      }, 'Control API response parse error');
      throw new DecodeError(endpoint, 'malformed JSON');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      logger.error({
        module: 'clients.controlApi',
        endpoint,
        validation_errors: issues,
      }, 'Control API schema mismatch');
      throw new DecodeError(endpoint, issues.join('; '));
    }
    return parsed.data;
  }

  async put(endpoint: string, body: unknown, options?: RequestOptions): Promise<void> {
    await this.request('PUT', endpoint, body, options);
  }

  async patch(endpoint: string, body: unknown, options?: RequestOptions): Promise<void> {
    await this.request('PATCH', endpoint, body, options);
  }

  // any 2xx on GET / means the controller is listening; the body is not read
  async ping(options?: RequestOptions): Promise<void> {
    await this.request('GET', '/', undefined, options);
  }

  getTraffic(): Promise<TrafficResponse> {
    return this.get('/traffic', trafficSchema);
  }

  getProxies(): Promise<ProxiesResponse> {
    return this.get('/proxies', proxiesSchema);
  }

  getProxyDelay(name: string, probe: DelayProbeOptions): Promise<DelayResponse> {
    const params = new URLSearchParams({ timeout: String(probe.timeoutMs), url: probe.url });
    // the core enforces probe.timeoutMs itself, the margin only covers the round trip
    return this.get(`/proxies/${encodeURIComponent(name)}/delay?${params.toString()}`, delaySchema, {
      timeoutMs: probe.timeoutMs + 1000,
    });
  }

  selectProxy(group: string, name: string): Promise<void> {
    const body: SelectProxyRequest = { name };
    return this.put(`/proxies/${encodeURIComponent(group)}`, body);
  }

  getConfigs(): Promise<ConfigsResponse> {
    return this.get('/configs', configsSchema);
  }

  patchConfigs(body: PatchConfigsRequest): Promise<void> {
    return this.patch('/configs', body);
  }

  private async request(method: string, endpoint: string, body?: unknown, options?: RequestOptions): Promise<string> {
    const timeout = options?.timeoutMs || this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.secret) {
      headers.Authorization = `Bearer ${this.secret}`;
    }

    let response: Response;
    let rawText: string;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      rawText = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        logger.debug({ module: 'clients.controlApi', method, endpoint, timeout_ms: timeout }, 'Control API timeout');
        throw new TransportError(endpoint, `Request to ${endpoint} timed out after ${timeout}ms`);
      }
      const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : errorMessage(error);
      logger.debug({ module: 'clients.controlApi', method, endpoint, error_detail: cause }, 'Control API unreachable');
      throw new TransportError(endpoint, `Control API unreachable: ${cause}`);
    } finally {
      clearTimeout(timeoutId);
    }

    const durationMs = Date.now() - startTime;

    if (!response.ok) {
      logger.debug({
        module: 'clients.controlApi',
        method,
        endpoint,
        status_code: response.status,
        duration_ms: durationMs,
      }, 'Control API error status');
      throw new ApiError(response.status, endpoint);
    }

    logger.trace({
      module: 'clients.controlApi',
      method,
      endpoint,
      status_code: response.status,
      duration_ms: durationMs,
    }, 'Control API call success');

    return rawText;
  }
}

export type ControlApi = Pick<
  ControlApiClient,
  'ping' | 'getTraffic' | 'getProxies' | 'getProxyDelay' | 'selectProxy' | 'getConfigs' | 'patchConfigs'
>;
