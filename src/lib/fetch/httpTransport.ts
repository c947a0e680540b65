import { setTimeout as delay } from 'node:timers/promises';
import { TransportError, describeError } from '@/lib/paymob/errors';
import { createLogger } from '@/lib/logging';

const log = createLogger('paymob_transport');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Objects are sent as JSON; strings are sent verbatim. */
  body?: unknown;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON when the response is JSON, otherwise the raw text. */
  body: unknown;
}

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface ConnectionOptions {
  timeoutMs: number;
  maxRetries: number;
  /** Delay before retry n (0-based) is `backoffFactorMs * 2 ** n`. */
  backoffFactorMs: number;
}

export function defaultConnectionOptions(): ConnectionOptions {
  return {
    timeoutMs: 15_000,
    maxRetries: 3,
    backoffFactorMs: 300,
  };
}

export function highThroughputConnectionOptions(): ConnectionOptions {
  return {
    timeoutMs: 10_000,
    maxRetries: 2,
    backoffFactorMs: 300,
  };
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface FetchHttpTransportOptions extends Partial<ConnectionOptions> {
  sleep?: (ms: number) => Promise<void>;
}

const buildHeaders = (
  initHeaders: Record<string, string> | undefined,
  hasJsonBody: boolean,
): Record<string, string> => {
  const base: Record<string, string> = {
    Accept: 'application/json',
  };

  if (hasJsonBody) {
    base['Content-Type'] = 'application/json';
  }

  return {
    ...base,
    ...(initHeaders ?? {}),
  };
};

function encodeBody(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return body;
  }
  return JSON.stringify(body);
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

/**
 * HTTPS-only transport over the global `fetch`. Non-2xx responses are
 * returned to the caller; only failures without a response are thrown.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly options: ConnectionOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: FetchHttpTransportOptions = {}) {
    const { sleep, ...connection } = options;
    this.options = { ...defaultConnectionOptions(), ...connection };
    this.sleep = sleep ?? ((ms) => delay(ms));
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (!request.url.startsWith('https://')) {
      throw new TransportError('Only HTTPS URLs are allowed');
    }
    if (request.signal?.aborted) {
      throw new TransportError(`Request aborted: ${request.method} ${request.url}`);
    }

    let attempt = 0;
    for (;;) {
      try {
        const response = await this.attempt(request);
        if (RETRYABLE_STATUSES.has(response.status) && attempt < this.options.maxRetries) {
          log.warn('request.retrying', {
            method: request.method,
            url: request.url,
            status: response.status,
            attempt: attempt + 1,
          });
          await this.sleep(this.options.backoffFactorMs * 2 ** attempt);
          attempt += 1;
          continue;
        }
        return response;
      } catch (error) {
        if (request.signal?.aborted || attempt >= this.options.maxRetries) {
          log.error('request.failed', {
            method: request.method,
            url: request.url,
            reason: describeError(error),
          });
          throw new TransportError(`Request failed: ${request.method} ${request.url} - ${describeError(error)}`, {
            cause: error,
          });
        }
        log.warn('request.retrying', {
          method: request.method,
          url: request.url,
          reason: describeError(error),
          attempt: attempt + 1,
        });
        await this.sleep(this.options.backoffFactorMs * 2 ** attempt);
        attempt += 1;
      }
    }
  }

  private async attempt(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    }
    request.signal?.addEventListener('abort', forwardAbort, { once: true });
    const body = encodeBody(request.body);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        redirect: 'manual',
        body,
        signal: controller.signal,
        headers: buildHeaders(request.headers, body !== undefined && typeof request.body !== 'string'),
      });

      return { status: response.status, body: await readBody(response) };
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
