export class PaymobError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'PaymobError';
  }
}

export class AuthenticationError extends PaymobError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

export class ConfigurationError extends PaymobError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends PaymobError {
  public readonly params?: Record<string, unknown>;

  constructor(message: string, params?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.params = params;
  }
}

/**
 * Raised by the HTTP transport when a request never produced a response:
 * refused URL, timeout, or a network failure that outlived the retries.
 */
export class TransportError extends PaymobError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class PaymobApiError extends PaymobError {
  public readonly status: number;
  public readonly body: unknown;

  constructor(message: string, init: { status: number; body?: unknown }) {
    super(message);
    this.name = 'PaymobApiError';
    this.status = init.status;
    this.body = init.body;
  }
}

export function describeError(reason: unknown): string {
  if (!reason) {
    return 'unknown error';
  }
  if (reason instanceof Error) {
    return reason.message;
  }
  try {
    return String(reason);
  } catch {
    return 'unknown error';
  }
}
