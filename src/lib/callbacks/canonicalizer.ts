import { ValidationError } from '@/lib/paymob/errors';
import type { CallbackPayload, DefinedCallback } from './types';
import { isBlank } from './values';

// Field order is Paymob's signing order. Do not sort or rename: any change
// breaks verification of every callback of that type.
export const TRANSACTION_FIELDS = [
  'amount_cents',
  'created_at',
  'currency',
  'error_occured',
  'has_parent_transaction',
  'id',
  'integration_id',
  'is_3d_secure',
  'is_auth',
  'is_capture',
  'is_refunded',
  'is_standalone_payment',
  'is_voided',
  'order.id',
  'owner',
  'pending',
  'source_data.pan',
  'source_data.sub_type',
  'source_data.type',
  'success',
] as const;

export const TOKEN_FIELDS = [
  'card_subtype',
  'created_at',
  'email',
  'id',
  'masked_pan',
  'merchant_id',
  'order_id',
  'token',
] as const;

type Fields = readonly string[];

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

function readOwn(source: Record<string, unknown>, key: string): unknown {
  return Object.hasOwn(source, key) ? source[key] : undefined;
}

/** `undefined` means absent; a JSON `null` is returned as `null`. */
function lookup(source: Record<string, unknown>, path: string): unknown {
  const [head, ...rest] = path.split('.');
  const value = readOwn(source, head);
  if (rest.length === 0) {
    return value;
  }
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return undefined;
  }
  return lookup(value as Record<string, unknown>, rest.join('.'));
}

export function renderValue(value: unknown): string {
  if (value === undefined) {
    return '';
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function concatenateFields(payload: CallbackPayload, fields: Fields): string {
  const obj = asRecord(payload.obj);
  return fields.map((field) => renderValue(lookup(obj, field))).join('');
}

function concatenateSubscription(payload: CallbackPayload): string {
  const triggerType = payload.trigger_type;
  const subscriptionId = asRecord(payload.subscription_data).id;

  if (isBlank(triggerType) || isBlank(subscriptionId)) {
    throw new ValidationError('Cannot authorize callback: Not a valid subscription callback', {
      hasTriggerType: !isBlank(triggerType),
      hasSubscriptionId: !isBlank(subscriptionId),
    });
  }

  return `${renderValue(triggerType)}for${renderValue(subscriptionId)}`;
}

/**
 * Builds the string Paymob signed for this callback. Transaction and token
 * callbacks read their fields from `payload.obj`.
 *
 * @throws ValidationError when a subscription callback lacks `trigger_type`
 *   or `subscription_data.id`.
 */
export function canonicalizeCallback(callback: DefinedCallback): string {
  switch (callback.type) {
    case 'transaction':
      return concatenateFields(callback.payload, TRANSACTION_FIELDS);
    case 'token':
      return concatenateFields(callback.payload, TOKEN_FIELDS);
    case 'subscription':
      return concatenateSubscription(callback.payload);
    default: {
      const unreachable: never = callback;
      throw new Error(`Unhandled callback type: ${JSON.stringify(unreachable)}`);
    }
  }
}
