// Base chat API adapter: authentication, HTTP calls, error mapping
import { ApiError, ConfigurationError, errorMessage } from '../services/errors.js';
import { defaultLogger, Logger } from '../services/logger.js';

/**
 * The subset of `fetch` the adapters rely on. Injectable for tests.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Provider-specific request format (varies by provider)
 */
export interface ProviderRequest {
  [key: string]: unknown;
}

/**
 * Options shared by every chat adapter
 */
export interface ChatClientOptions {
  /** Falls back to the adapter's API key environment variable */
  apiKey?: string;
  baseUrl?: string;
  /** Per-call timeout; streams are covered from request to last byte */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
  /** Source for the fallback API key */
  env?: NodeJS.ProcessEnv;
}

/**
 * Fixed per-adapter settings
 */
export interface AdapterDefaults {
  providerId: string;
  baseUrl: string;
  apiKeyEnvVar: string;
  timeoutMs: number;
}

/**
 * One outbound call: the response plus the handle that releases it
 */
interface OpenCall {
  response: Response;
  url: string;
  startedAt: number;
  abort: () => void;
  release: () => void;
  describeFailure: (error: unknown) => string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull `error.message` out of an error body, if it has one
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') {
    return body.error.message;
  }
  return undefined;
}

/**
 * Abstract base class for chat API adapters.
 *
 * Owns the transport: every in-flight request is tracked so that
 * `close()` can release it.
 */
export abstract class ChatApiAdapter {
  readonly providerId: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  protected readonly logger: Logger;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(defaults: AdapterDefaults, options: ChatClientOptions = {}) {
    const env = options.env ?? process.env;
    const apiKey = options.apiKey || env[defaults.apiKeyEnvVar];
    if (!apiKey) {
      throw new ConfigurationError(
        `API key is required. Set ${defaults.apiKeyEnvVar} environment variable or pass apiKey.`
      );
    }

    this.providerId = defaults.providerId;
    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl || defaults.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = (options.logger ?? defaultLogger).child({ provider: defaults.providerId });
  }

  /**
   * Build headers for API requests
   */
  protected buildHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  /**
   * Absolute URL of an endpoint relative to the base URL
   */
  protected endpoint(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Abort every in-flight request. Later calls fail with a transport error.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  /**
   * Send a POST and return the response once it is known to be 2xx.
   * The caller owns the returned call and must release it.
   */
  private async openCall(path: string, body: unknown): Promise<OpenCall> {
    if (this.closed) {
      throw new ApiError('transport', 'Client is closed');
    }

    const url = this.endpoint(path);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    timer.unref();
    this.inFlight.add(controller);

    const release = (): void => {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    };
    const describeFailure = (error: unknown): string => {
      if (timedOut) return `Request timed out after ${this.timeoutMs}ms`;
      if (this.closed) return 'Client is closed';
      return `Request failed: ${errorMessage(error)}`;
    };

    const startedAt = Date.now();
    this.logger.logRequestStart('POST', url);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      release();
      this.logger.warn('Request failed before a response was received', {
        url,
        durationMs: Date.now() - startedAt,
        error: errorMessage(error),
      });
      throw new ApiError('transport', describeFailure(error), { cause: error });
    }

    this.logger.logRequestEnd('POST', url, response.status, Date.now() - startedAt);

    if (!response.ok) {
      try {
        throw await this.toHttpError(response);
      } finally {
        release();
      }
    }

    return {
      response,
      url,
      startedAt,
      abort: () => controller.abort(),
      release,
      describeFailure,
    };
  }

  /**
   * Map a non-2xx response to a protocol error
   */
  private async toHttpError(response: Response): Promise<ApiError> {
    const fallback = `HTTP ${response.status}: ${response.statusText}`;
    let text = '';
    try {
      text = await response.text();
    } catch (error) {
      return new ApiError('protocol', fallback, { statusCode: response.status, cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return new ApiError('protocol', fallback, { statusCode: response.status });
    }

    return new ApiError('protocol', extractErrorMessage(parsed) ?? fallback, {
      statusCode: response.status,
      response: parsed,
    });
  }

  /**
   * Make an HTTP POST request and decode the JSON body
   */
  protected async httpPost<T>(
    path: string,
    body: unknown,
    decode: (data: unknown, statusCode: number) => T
  ): Promise<T> {
    const call = await this.openCall(path, body);
    let text: string;
    try {
      text = await call.response.text();
    } catch (error) {
      throw new ApiError('transport', call.describeFailure(error), { cause: error });
    } finally {
      call.release();
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ApiError('decode', 'Response body is not valid JSON', {
        statusCode: call.response.status,
        cause: error,
      });
    }

    return decode(data, call.response.status);
  }

  /**
   * Make a streaming HTTP POST request, yielding decoded text as it arrives
   */
  protected async *httpPostStream(path: string, body: unknown): AsyncGenerator<string> {
    const call = await this.openCall(path, body);

    if (!call.response.body) {
      call.release();
      throw new ApiError('decode', 'Response body is null', { statusCode: call.response.status });
    }

    const reader = call.response.body.getReader();
    const decoder = new TextDecoder();
    let completed = false;

    try {
      while (true) {
        let result: Awaited<ReturnType<typeof reader.read>>;
        try {
          result = await reader.read();
        } catch (error) {
          throw new ApiError('transport', call.describeFailure(error), { cause: error });
        }
        if (result.done) break;
        yield decoder.decode(result.value, { stream: true });
      }

      completed = true;
      const tail = decoder.decode();
      if (tail) {
        yield tail;
      }
    } finally {
      if (!completed) {
        // Abandoned or failed: drop the connection
        call.abort();
      }
      reader.releaseLock();
      call.release();
      this.logger.debug('Stream closed', {
        url: call.url,
        completed,
        durationMs: Date.now() - call.startedAt,
      });
    }
  }
}
