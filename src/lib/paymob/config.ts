import { ConfigurationError } from './errors';

export const DEFAULT_PAYMOB_BASE_URL = 'https://accept.paymob.com';

/** Paymob tokens live one hour; the cache drops them five minutes early. */
export const DEFAULT_TOKEN_TTL_SECONDS = 55 * 60;

/**
 * Paymob account configuration. These values come from the Paymob dashboard.
 */
export interface PaymobConfig {
  apiKey: string;
  baseUrl: string;
  /** Only needed by the callback authenticator. */
  hmacSecretKey?: string;
  tokenTtlSeconds: number;
}

export interface PaymobConfigInput {
  apiKey?: string | null;
  baseUrl?: string | null;
  hmacSecretKey?: string | null;
  tokenTtlSeconds?: number | null;
}

function clean(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return value.trim();
}

function resolveTokenTtl(value: number | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_TOKEN_TTL_SECONDS;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError('tokenTtlSeconds must be a positive integer');
  }
  return value;
}

export function createPaymobConfig(input: PaymobConfigInput): PaymobConfig {
  const apiKey = clean(input.apiKey);
  if (!apiKey) {
    throw new ConfigurationError('Missing required config: apiKey');
  }

  const baseUrl = (clean(input.baseUrl) || DEFAULT_PAYMOB_BASE_URL).replace(/\/+$/, '');
  if (!baseUrl.startsWith('https://')) {
    throw new ConfigurationError('baseUrl must start with https://');
  }

  const hmacSecretKey = clean(input.hmacSecretKey);

  return {
    apiKey,
    baseUrl,
    ...(hmacSecretKey ? { hmacSecretKey } : {}),
    tokenTtlSeconds: resolveTokenTtl(input.tokenTtlSeconds),
  };
}

function parseTtl(raw: string | undefined): number | null {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError('PAYMOB_TOKEN_TTL_SECONDS must be an integer');
  }
  return parsed;
}

/**
 * Reads PAYMOB_API_KEY, PAYMOB_BASE_URL, PAYMOB_HMAC_SECRET_KEY and
 * PAYMOB_TOKEN_TTL_SECONDS.
 */
export function resolvePaymobConfig(env: NodeJS.ProcessEnv = process.env): PaymobConfig {
  return createPaymobConfig({
    apiKey: env.PAYMOB_API_KEY,
    baseUrl: env.PAYMOB_BASE_URL,
    hmacSecretKey: env.PAYMOB_HMAC_SECRET_KEY,
    tokenTtlSeconds: parseTtl(env.PAYMOB_TOKEN_TTL_SECONDS),
  });
}
