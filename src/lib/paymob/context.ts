import { CallbackAuthenticator } from '@/lib/callbacks/authenticator';
import { getCredentialCache, resetCredentialCacheForTesting } from '@/lib/credentials';
import { FetchHttpTransport, type HttpTransport } from '@/lib/fetch/httpTransport';
import { resolvePaymobConfig, type PaymobConfig } from './config';
import { TokenManager } from './tokenManager';
import { PaymobTransactionsClient } from './transactions';

let config: PaymobConfig | null = null;
let transport: HttpTransport | null = null;
let tokenManager: TokenManager | null = null;
let transactionsClient: PaymobTransactionsClient | null = null;
let authenticator: CallbackAuthenticator | null = null;

export function getPaymobConfig(): PaymobConfig {
  if (!config) {
    config = resolvePaymobConfig();
  }
  return config;
}

export function getHttpTransport(): HttpTransport {
  if (!transport) {
    transport = new FetchHttpTransport();
  }
  return transport;
}

export function getTokenManager(): TokenManager {
  if (!tokenManager) {
    tokenManager = new TokenManager({
      config: getPaymobConfig(),
      transport: getHttpTransport(),
      cache: getCredentialCache(),
    });
  }
  return tokenManager;
}

export function getTransactionsClient(): PaymobTransactionsClient {
  if (!transactionsClient) {
    transactionsClient = new PaymobTransactionsClient({
      config: getPaymobConfig(),
      transport: getHttpTransport(),
      tokens: getTokenManager(),
    });
  }
  return transactionsClient;
}

/**
 * Webhook handlers only need the HMAC secret, so this does not require the
 * rest of the Paymob configuration.
 */
export function getCallbackAuthenticator(): CallbackAuthenticator {
  if (!authenticator) {
    authenticator = new CallbackAuthenticator({ hmacSecretKey: process.env.PAYMOB_HMAC_SECRET_KEY });
  }
  return authenticator;
}

export function resetPaymobContextForTesting(): void {
  config = null;
  transport = null;
  tokenManager = null;
  transactionsClient = null;
  authenticator = null;
  resetCredentialCacheForTesting();
}
