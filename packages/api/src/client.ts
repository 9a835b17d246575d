/**
 * Base API client for upstream JSON APIs
 *
 * One call = one HTTP attempt. Every failure is mapped onto the error
 * taxonomy in ./errors; retrying is left to the caller.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import {
  AuthError,
  BaseAPIError,
  EntityNotFoundError,
  MalformedResponseError,
  RateLimitedError,
  TimeoutError,
  TransportError,
  UpstreamError,
} from './errors';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  /** Total timeout override in ms */
  timeout?: number;
  headers?: Record<string, string>;
  /** Name of the requested entity, carried into not-found errors */
  entity?: string;
}

export interface ApiClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  /** Sent with every request, e.g. credentials and unit selection */
  defaultParams?: QueryParams;
  /** Query parameters masked in error URLs */
  secretParams?: string[];
  /** Total request timeout in ms, body included (default 30s) */
  timeout?: number;
  /** Connect timeout in ms (default 10s); must be shorter than `timeout` */
  connectTimeout?: number;
  /** undici dispatcher; a pooled Agent is created when omitted */
  dispatcher?: Dispatcher;
  onError?: (error: BaseAPIError) => void;
}

const CONNECT_TIMEOUT_CODE = 'UND_ERR_CONNECT_TIMEOUT';
const MAX_ERROR_BODY_LENGTH = 500;

function causeCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

export class ApiClient {
  private baseUrl: string;
  private defaultHeaders: Record<string, string>;
  private defaultParams: QueryParams;
  private secretParams: Set<string>;
  private timeout: number;
  private connectTimeout: number;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private onError?: (error: BaseAPIError) => void;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultParams = config.defaultParams ?? {};
    this.secretParams = new Set(config.secretParams ?? []);
    this.timeout = config.timeout ?? 30_000;
    this.connectTimeout = config.connectTimeout ?? 10_000;
    this.onError = config.onError;

    if (this.connectTimeout >= this.timeout) {
      throw new RangeError(
        `connectTimeout (${this.connectTimeout}ms) must be shorter than timeout (${this.timeout}ms)`
      );
    }

    this.ownsDispatcher = config.dispatcher === undefined;
    this.dispatcher = config.dispatcher ?? new Agent({ connect: { timeout: this.connectTimeout } });
  }

  private buildUrl(path: string, params: QueryParams): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    });
    return url;
  }

  private redact(url: URL): string {
    const safe = new URL(url);
    for (const key of this.secretParams) {
      if (safe.searchParams.has(key)) {
        safe.searchParams.set(key, '****');
      }
    }
    return safe.toString();
  }

  async get<T>(
    path: string,
    options: RequestOptions = {},
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const timeout = options.timeout ?? this.timeout;
    const url = this.buildUrl(path, { ...this.defaultParams, ...options.params });
    const safeUrl = this.redact(url);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          ...this.defaultHeaders,
          ...options.headers,
        },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      // The body read stays under the same deadline
      const text = await response.text();

      if (!response.ok) {
        const body = text.slice(0, MAX_ERROR_BODY_LENGTH);
        switch (response.status) {
          case 404:
            throw new EntityNotFoundError(safeUrl, body, options.entity);
          case 401:
            throw new AuthError(safeUrl, body);
          case 429:
            throw RateLimitedError.fromResponse(safeUrl, response.headers, body);
          default:
            throw new UpstreamError(
              `API request failed: ${response.status} ${response.statusText}`,
              response.status,
              response.statusText,
              safeUrl,
              body
            );
        }
      }

      return this.parseBody(text, schema, safeUrl);
    } catch (error) {
      const apiError = this.toApiError(error, safeUrl, timeout, controller.signal.aborted);
      this.onError?.(apiError);
      throw apiError;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private parseBody<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, url: string): T {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(
        'Response body is not valid JSON',
        url,
        [],
        text.slice(0, MAX_ERROR_BODY_LENGTH),
        error
      );
    }

    const result = schema.safeParse(data);
    if (!result.success) {
      throw MalformedResponseError.fromZodError(result.error, url, data);
    }
    return result.data;
  }

  private toApiError(error: unknown, url: string, timeout: number, aborted: boolean): BaseAPIError {
    if (error instanceof BaseAPIError) {
      return error;
    }
    if (aborted) {
      return new TimeoutError(url, timeout, 'total', error);
    }
    if (causeCode(error) === CONNECT_TIMEOUT_CODE) {
      return new TimeoutError(url, this.connectTimeout, 'connect', error);
    }
    return new TransportError(url, error);
  }

  /**
   * Release pooled connections (only those this client created)
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/**
 * Create an API client with configuration
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  return new ApiClient(config);
}
