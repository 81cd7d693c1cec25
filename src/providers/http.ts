/**
 * Shared HTTP plumbing for provider clients: rate limiting, timeouts,
 * retry with exponential backoff, zod validation and error classification.
 */

import type { z } from 'zod';
import { ProviderError, type ProviderFailureReason, type ProviderName } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import type { RateLimiter } from './rate_limiter';

const logger = createChildLogger('http');

export type QueryParams = Record<string, string | number | undefined>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetryOptions {
  maxRetries: number;
  initialBackoffMs: number;
}

export interface HttpClientOptions {
  provider: ProviderName;
  baseUrl: string;
  timeoutMs: number;
  retry: RetryOptions;
  rateLimiter: RateLimiter;
  /** Values scrubbed from every error message (API keys, secrets). */
  secrets?: Array<string | null>;
  fetchImpl?: FetchLike;
  /** Lets a provider reclassify an error body (e.g. a rate limit reported as HTTP 500). */
  classifyErrorBody?: (status: number, body: string) => ProviderFailureReason | null;
}

interface RequestSpec {
  method: 'GET' | 'POST';
  path: string;
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly secrets: string[];

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.secrets = (options.secrets ?? []).filter((s): s is string => Boolean(s));
  }

  get provider(): ProviderName {
    return this.options.provider;
  }

  async getJson<S extends z.ZodTypeAny>(
    path: string,
    params: QueryParams,
    schema: S,
    headers: Record<string, string> = {}
  ): Promise<z.output<S>> {
    const response = await this.requestWithRetry({ method: 'GET', path, params, headers });
    return this.parseJson(response, path, schema);
  }

  async postJson<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S,
    headers: Record<string, string> = {}
  ): Promise<z.output<S>> {
    const response = await this.requestWithRetry({ method: 'POST', path, body, headers });
    return this.parseJson(response, path, schema);
  }

  async getBytes(path: string, params: QueryParams): Promise<Uint8Array> {
    const response = await this.requestWithRetry({ method: 'GET', path, params });
    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw this.error(`${path} body could not be read`, 'transport', response.status, error);
    }
  }

  private async parseJson<S extends z.ZodTypeAny>(
    response: Response,
    path: string,
    schema: S
  ): Promise<z.output<S>> {
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw this.error(`${path} returned a non-JSON body`, 'invalid_response', response.status, error);
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown';
      throw this.error(`${path} returned an unexpected payload (${where})`, 'invalid_response', response.status);
    }
    return parsed.data;
  }

  private async requestWithRetry(spec: RequestSpec): Promise<Response> {
    const { maxRetries, initialBackoffMs } = this.options.retry;
    let lastError: ProviderError | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await this.options.rateLimiter.schedule(() => this.execute(spec));
      } catch (error) {
        lastError = error instanceof ProviderError ? error : this.classifyThrown(spec.path, error);
        if (!lastError.retryable || attempt >= maxRetries) {
          break;
        }
        const backoffMs = initialBackoffMs * Math.pow(2, attempt);
        logger.warn(
          {
            provider: this.options.provider,
            path: spec.path,
            attempt: attempt + 1,
            backoffMs,
            reason: lastError.reason,
          },
          'Provider request failed, retrying'
        );
        await this.sleep(backoffMs);
      }
    }

    const failure =
      lastError ?? this.error(`${spec.path} failed after retries`, 'transport', null);
    logger.error(
      { provider: this.options.provider, path: spec.path, reason: failure.reason, status: failure.status },
      'Provider request failed'
    );
    throw failure;
  }

  private async execute(spec: RequestSpec): Promise<Response> {
    const url = this.buildUrl(spec.path, spec.params);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...(spec.body !== undefined ? { 'Content-Type': 'application/json; charset=utf-8' } : {}),
      ...spec.headers,
    };

    try {
      const response = await this.fetchImpl(url, {
        method: spec.method,
        headers,
        body: spec.body !== undefined ? JSON.stringify(spec.body) : undefined,
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw this.error(
          `${spec.method} ${spec.path} failed: HTTP ${response.status}${body ? ` ${body.slice(0, 200)}` : ''}`,
          this.classifyStatus(response.status, body),
          response.status
        );
      }

      return response;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private classifyStatus(status: number, body: string): ProviderFailureReason {
    const override = this.options.classifyErrorBody?.(status, body);
    if (override) return override;
    if (status === 401 || status === 403) return 'auth';
    if (status === 404) return 'not_found';
    if (status === 429) return 'rate_limit';
    return 'api';
  }

  private classifyThrown(path: string, error: unknown): ProviderError {
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return this.error(`${path} timed out after ${this.options.timeoutMs}ms`, 'timeout', null, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return this.error(`${path} transport error: ${message}`, 'transport', null, error);
  }

  private buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(`${this.options.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private error(
    message: string,
    reason: ProviderFailureReason,
    status: number | null,
    cause?: unknown
  ): ProviderError {
    return new ProviderError(
      this.redact(`${this.options.provider}: ${message}`),
      this.options.provider,
      reason,
      status,
      cause
    );
  }

  redact(message: string): string {
    let out = message;
    for (const secret of this.secrets) {
      out = out.split(secret).join('[REDACTED]');
    }
    return out;
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
