/**
 * HTTP client for the patrol backend
 *
 * Adds the bearer token, bounds every call with a timeout and maps failures
 * onto the shared error taxonomy: 4xx become domain errors, while 5xx,
 * timeouts, refused connections and cancellation become
 * TransientNetworkError.
 */

import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import {
  AppError,
  TransientNetworkError,
  UnauthorizedError,
  ValidationError,
  errorFromStatus,
  toError,
} from '../../../shared/errors.js';

const logger = getLogger('ApiClient');

export interface TokenProvider {
  isTokenValid(): boolean;
  getToken(): string;
}

export interface RequestOptions {
  body?: unknown;
  form?: FormData;
  signal?: AbortSignal;
  /** Defaults to true. Public endpoints (auth) pass false. */
  authenticated?: boolean;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const errorBodySchema = z.object({
  message: z.string().optional(),
  error: z.string().optional(),
}).passthrough();

export class ApiClient {
  private baseUrl: string;
  private timeoutMs: number;
  private tokenProvider: TokenProvider | null;

  constructor(baseUrl: string, tokenProvider: TokenProvider | null, timeoutMs: number = 30000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.tokenProvider = tokenProvider;
    this.timeoutMs = timeoutMs;
  }

  setTokenProvider(tokenProvider: TokenProvider): void {
    this.tokenProvider = tokenProvider;
  }

  private authorizationHeader(): string {
    if (!this.tokenProvider || !this.tokenProvider.isTokenValid()) {
      throw new UnauthorizedError('No valid authentication token');
    }
    return `Bearer ${this.tokenProvider.getToken()}`;
  }

  async request<T>(method: HttpMethod, endpoint: string, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.authenticated !== false) {
      headers.Authorization = this.authorizationHeader();
    }

    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, { method, headers, body, signal });
    } catch (error) {
      throw this.classifyNetworkError(error, method, endpoint, options.signal, timeout);
    }

    if (!response.ok) {
      const message = await this.readErrorMessage(response);
      logger.debug('Request rejected', { method, endpoint, status: response.status, message });
      throw errorFromStatus(response.status, message);
    }

    if (response.status === 204) {
      return schema.parse(undefined);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransientNetworkError(`Invalid response from ${endpoint}: ${toError(error).message}`, response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(`Unexpected response shape from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  private classifyNetworkError(
    error: unknown,
    method: HttpMethod,
    endpoint: string,
    callerSignal: AbortSignal | undefined,
    timeout: AbortSignal
  ): AppError {
    if (error instanceof AppError) return error;
    if (callerSignal?.aborted) {
      return new TransientNetworkError(`${method} ${endpoint} cancelled`);
    }
    if (timeout.aborted) {
      return new TransientNetworkError(`${method} ${endpoint} timed out after ${this.timeoutMs}ms`, 408);
    }
    const cause = toError(error);
    logger.debug('Network error', { method, endpoint, error: cause.message });
    return new TransientNetworkError(`${method} ${endpoint} failed: ${cause.message}`);
  }

  private async readErrorMessage(response: Response): Promise<string> {
    const fallback = `${response.status} ${response.statusText}`.trim();
    try {
      const parsed = errorBodySchema.safeParse(await response.json());
      if (parsed.success) {
        return parsed.data.message ?? parsed.data.error ?? fallback;
      }
      return fallback;
    } catch {
      return fallback;
    }
  }

  get<T>(endpoint: string, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('GET', endpoint, schema, options);
  }

  post<T>(endpoint: string, body: unknown, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('POST', endpoint, schema, { ...options, body });
  }

  put<T>(endpoint: string, body: unknown, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('PUT', endpoint, schema, { ...options, body });
  }

  delete<T>(endpoint: string, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    return this.request('DELETE', endpoint, schema, options);
  }
}
