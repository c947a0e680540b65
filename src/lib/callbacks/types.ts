/** Decoded JSON body of a Paymob callback. */
export type CallbackPayload = Record<string, unknown>;

export type CallbackQueryParams = Record<string, string | readonly string[] | undefined>;

export type VerifiedCallbackType = 'transaction' | 'token' | 'subscription';

export type CallbackType = VerifiedCallbackType | 'undefined';

export type UndefinedCallbackReason = 'unknown_marker' | 'unrecognised_shape';

export type ClassifiedCallback =
  | { type: 'transaction'; payload: CallbackPayload }
  | { type: 'token'; payload: CallbackPayload }
  | { type: 'subscription'; payload: CallbackPayload }
  | { type: 'undefined'; payload: CallbackPayload; reason: UndefinedCallbackReason; marker?: string };

export type DefinedCallback = Exclude<ClassifiedCallback, { type: 'undefined' }>;
