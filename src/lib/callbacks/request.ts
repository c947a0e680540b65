import type { CallbackPayload, CallbackQueryParams } from './types';

export interface CallbackRequest {
  payload: CallbackPayload;
  queryParams: CallbackQueryParams;
  origin: string;
}

async function readPayload(request: Request): Promise<CallbackPayload> {
  const text = await request.text();
  if (!text.trim()) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed as CallbackPayload;
    }
  } catch {
    return {};
  }
  return {};
}

function readQueryParams(url: string): CallbackQueryParams {
  const params: Record<string, string | string[]> = {};
  new URL(url).searchParams.forEach((value, key) => {
    const existing = params[key];
    if (existing === undefined) {
      params[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      params[key] = [existing, value];
    }
  });
  return params;
}

function resolveOrigin(headers: Headers): string {
  const forwarded = headers.get('x-forwarded-for')?.split(',')[0]?.trim();
  if (forwarded) {
    return forwarded;
  }
  return headers.get('x-real-ip')?.trim() || 'unknown';
}

/**
 * Splits an inbound webhook request into what `CallbackAuthenticator`
 * takes. Responding to the request is left to the caller.
 */
export async function readCallbackRequest(request: Request): Promise<CallbackRequest> {
  return {
    payload: await readPayload(request),
    queryParams: readQueryParams(request.url),
    origin: resolveOrigin(request.headers),
  };
}
