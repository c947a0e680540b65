import { describe, expect, it } from 'vitest';
import {
  TOKEN_FIELDS,
  TRANSACTION_FIELDS,
  canonicalizeCallback,
  renderValue,
} from '@/lib/callbacks';
import { ValidationError } from '@/lib/paymob';

const TRANSACTION_OBJ = {
  amount_cents: 1000,
  created_at: '2024-01-01T10:00:00.000000',
  currency: 'EGP',
  error_occured: false,
  has_parent_transaction: false,
  id: 192036465,
  integration_id: 4097558,
  is_3d_secure: true,
  is_auth: false,
  is_capture: false,
  is_refunded: false,
  is_standalone_payment: true,
  is_voided: false,
  order: { id: 217503754, merchant_order_id: 'order-77' },
  owner: 1710,
  pending: false,
  source_data: { pan: '2346', sub_type: 'MasterCard', type: 'card' },
  success: true,
  data: { message: 'Approved' },
};

describe('canonicalizeCallback', () => {
  it('keeps the signing field lists', () => {
    expect(TRANSACTION_FIELDS).toHaveLength(20);
    expect(TRANSACTION_FIELDS[13]).toBe('order.id');
    expect(TOKEN_FIELDS).toEqual([
      'card_subtype',
      'created_at',
      'email',
      'id',
      'masked_pan',
      'merchant_id',
      'order_id',
      'token',
    ]);
  });

  it('concatenates transaction fields in signing order', () => {
    const canonical = canonicalizeCallback({
      type: 'transaction',
      payload: { type: 'TRANSACTION', obj: TRANSACTION_OBJ },
    });

    expect(canonical).toBe(
      '10002024-01-01T10:00:00.000000EGPfalsefalse1920364654097558truefalsefalsefalsetruefalse2175037541710false2346MasterCardcardtrue',
    );
  });

  it('renders empty strings as nothing and booleans in lowercase', () => {
    const obj = Object.fromEntries(TRANSACTION_FIELDS.filter((field) => !field.includes('.')).map((field) => [field, '']));
    const payload = {
      obj: {
        ...obj,
        amount_cents: 1000,
        pending: false,
        success: true,
        order: { id: '' },
        source_data: { pan: '', sub_type: '', type: '' },
      },
    };

    expect(canonicalizeCallback({ type: 'transaction', payload })).toBe('1000falsetrue');
  });

  it('renders null as "null" and absent fields as nothing', () => {
    const payload = { obj: { amount_cents: null, source_data: null, success: true } };

    expect(canonicalizeCallback({ type: 'transaction', payload })).toBe('nulltrue');
  });

  it('reads an absent obj as empty', () => {
    expect(canonicalizeCallback({ type: 'transaction', payload: { type: 'transaction' } })).toBe('');
  });

  it('concatenates token fields in signing order', () => {
    const payload = {
      type: 'TOKEN',
      obj: {
        card_subtype: 'Visa',
        created_at: '2024-02-02T08:00:00',
        email: 'buyer@example.com',
        id: 555,
        masked_pan: 'xxxx-xxxx-xxxx-1234',
        merchant_id: 42,
        order_id: 9001,
        token: 'tok_abc',
        user_added: true,
      },
    };

    expect(canonicalizeCallback({ type: 'token', payload })).toBe(
      'Visa2024-02-02T08:00:00buyer@example.com555xxxx-xxxx-xxxx-1234429001tok_abc',
    );
  });

  it('joins trigger type and subscription id for subscriptions', () => {
    const payload = { trigger_type: 'suspended', subscription_data: { id: 314 } };

    expect(canonicalizeCallback({ type: 'subscription', payload })).toBe('suspendedfor314');
  });

  it('rejects subscription callbacks without a subscription id', () => {
    const payload = { trigger_type: 'suspended', subscription_data: { state: 'active' } };

    expect(() => canonicalizeCallback({ type: 'subscription', payload })).toThrow(ValidationError);
  });

  it('rejects subscription callbacks without a trigger type', () => {
    const payload = { subscription_data: { id: 314 } };

    expect(() => canonicalizeCallback({ type: 'subscription', payload })).toThrow(
      'Cannot authorize callback: Not a valid subscription callback',
    );
  });

  it('treats falsy trigger types and subscription ids as missing', () => {
    const zeroTrigger = { trigger_type: 0, subscription_data: { id: 314 } };
    const falseTrigger = { trigger_type: false, subscription_data: { id: 314 } };
    const zeroId = { trigger_type: 'suspended', subscription_data: { id: 0 } };

    expect(() => canonicalizeCallback({ type: 'subscription', payload: zeroTrigger })).toThrow(ValidationError);
    expect(() => canonicalizeCallback({ type: 'subscription', payload: falseTrigger })).toThrow(ValidationError);
    expect(() => canonicalizeCallback({ type: 'subscription', payload: zeroId })).toThrow(ValidationError);
  });

  it('is deterministic across calls', () => {
    const callback = { type: 'transaction' as const, payload: { obj: TRANSACTION_OBJ } };
    const first = canonicalizeCallback(callback);
    canonicalizeCallback({ type: 'token', payload: { obj: { token: 'tok_other' } } });

    expect(canonicalizeCallback(callback)).toBe(first);
  });
});

describe('renderValue', () => {
  it('renders values the way Paymob signs them', () => {
    expect(renderValue(true)).toBe('true');
    expect(renderValue(false)).toBe('false');
    expect(renderValue(null)).toBe('null');
    expect(renderValue(undefined)).toBe('');
    expect(renderValue(0)).toBe('0');
    expect(renderValue('EGP')).toBe('EGP');
    expect(renderValue({ id: 1 })).toBe('{"id":1}');
  });
});
