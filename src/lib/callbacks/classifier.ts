import type { CallbackPayload, ClassifiedCallback } from './types';
import { isBlank } from './values';

function isNonEmptyObject(value: unknown): boolean {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value) && Object.keys(value as object).length > 0;
}

function describeMarker(marker: unknown): string {
  return typeof marker === 'string' ? marker : JSON.stringify(marker);
}

/**
 * Determines the callback type from the payload alone.
 *
 * A non-blank `type` field wins and is matched case-insensitively; an
 * unrecognised marker is not second-guessed from the payload's shape. Without
 * a marker, a populated `subscription_data` object means a subscription event.
 */
export function classifyCallback(payload: CallbackPayload): ClassifiedCallback {
  const marker = payload.type;
  if (!isBlank(marker)) {
    if (typeof marker !== 'string') {
      return { type: 'undefined', payload, reason: 'unknown_marker', marker: describeMarker(marker) };
    }

    switch (marker.trim().toLowerCase()) {
      case 'transaction':
        return { type: 'transaction', payload };
      case 'token':
        return { type: 'token', payload };
      case 'subscription':
        return { type: 'subscription', payload };
      default:
        return { type: 'undefined', payload, reason: 'unknown_marker', marker };
    }
  }

  if (isNonEmptyObject(payload.subscription_data)) {
    return { type: 'subscription', payload };
  }

  return { type: 'undefined', payload, reason: 'unrecognised_shape' };
}
