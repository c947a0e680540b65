import { createHmac, timingSafeEqual } from 'node:crypto';
import { createLogger } from '@/lib/logging';
import { ConfigurationError } from '@/lib/paymob/errors';
import { canonicalizeCallback } from './canonicalizer';
import { classifyCallback } from './classifier';
import type { CallbackPayload, CallbackQueryParams, VerifiedCallbackType } from './types';

const log = createLogger('paymob_callback');

export function computeHmac(secret: string, message: string): string {
  return createHmac('sha512', secret).update(message, 'utf8').digest('hex');
}

/**
 * Signs a payload the way Paymob does. Returns null when the payload has no
 * recognisable type or nothing to sign.
 */
export function computeCallbackSignature(secret: string, payload: CallbackPayload): string | null {
  const classified = classifyCallback(payload);
  if (classified.type === 'undefined') {
    return null;
  }
  const canonical = canonicalizeCallback(classified);
  return canonical ? computeHmac(secret, canonical) : null;
}

function firstString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value || null;
  }
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === 'string' && first ? first : null;
  }
  return null;
}

/** Paymob puts the signature in the body for some callbacks and in the query string for others. */
export function extractPresentedSignature(
  payload: CallbackPayload,
  queryParams?: CallbackQueryParams | null,
): string | null {
  return firstString(payload.hmac) ?? firstString(queryParams?.hmac);
}

function signaturesMatch(expected: string, presented: string): boolean {
  const expectedBuffer = Buffer.from(expected, 'utf8');
  const presentedBuffer = Buffer.from(presented, 'utf8');
  if (expectedBuffer.length !== presentedBuffer.length) {
    return false;
  }
  return timingSafeEqual(expectedBuffer, presentedBuffer);
}

export interface CallbackAuthenticatorOptions {
  hmacSecretKey: string | null | undefined;
}

export class CallbackAuthenticator {
  private readonly secret: string;

  constructor(options: CallbackAuthenticatorOptions) {
    const secret = options.hmacSecretKey?.trim();
    if (!secret) {
      throw new ConfigurationError('Paymob HMAC secret key not configured');
    }
    this.secret = secret;
  }

  /**
   * Verifies a callback against its HMAC-SHA512 signature.
   *
   * Returns the verified callback type, or null for a missing signature, an
   * unclassifiable payload or a mismatch. Rejections are logged with origin
   * and payload; the reason is not returned so the webhook response can stay
   * uninformative.
   *
   * @throws ValidationError for a subscription callback without
   *   `trigger_type` or `subscription_data.id`.
   */
  authenticate(
    payload: CallbackPayload,
    queryParams?: CallbackQueryParams | null,
    origin = 'unknown',
  ): VerifiedCallbackType | null {
    const presented = extractPresentedSignature(payload, queryParams);
    if (!presented) {
      log.error('callback.hmac_missing', { origin, payload });
      return null;
    }

    const classified = classifyCallback(payload);
    if (classified.type === 'undefined') {
      log.error('callback.type_undefined', {
        origin,
        reason: classified.reason,
        marker: classified.marker,
        payload,
      });
      return null;
    }

    const canonical = canonicalizeCallback(classified);
    log.debug('callback.canonicalized', { type: classified.type, canonical });
    if (!canonical) {
      log.error('callback.canonical_empty', { origin, type: classified.type, payload });
      return null;
    }

    const expected = computeHmac(this.secret, canonical);
    log.debug('callback.hmac_compared', { expected, presented });
    if (!signaturesMatch(expected, presented)) {
      log.error('callback.hmac_invalid', { origin, type: classified.type, payload });
      return null;
    }

    return classified.type;
  }
}
