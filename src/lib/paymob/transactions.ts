import { isSuccessStatus } from '@/lib/fetch/httpTransport';
import type { HttpTransport, TransportResponse } from '@/lib/fetch/httpTransport';
import { createLogger } from '@/lib/logging';
import type { PaymobConfig } from './config';
import { PaymobApiError } from './errors';
import type { TokenManager } from './tokenManager';

const log = createLogger('paymob_api');

const FORBIDDEN = 403;

export type TokenSource = Pick<TokenManager, 'getToken'>;

/**
 * Runs an authorised call with the cached token. A 403 means the token expired
 * between the cache read and its use: the token is force-refreshed and the call
 * retried once. The second response is returned whatever its status.
 */
export async function withTokenRetry(
  tokens: TokenSource,
  call: (token: string) => Promise<TransportResponse>,
): Promise<TransportResponse> {
  const first = await call(await tokens.getToken());
  if (first.status !== FORBIDDEN) {
    return first;
  }

  log.warn('request.token_rejected');
  return call(await tokens.getToken(true));
}

export interface PaymobTransactionsClientOptions {
  config: Pick<PaymobConfig, 'baseUrl'>;
  transport: HttpTransport;
  tokens: TokenSource;
}

export class PaymobTransactionsClient {
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly tokens: TokenSource;

  constructor(options: PaymobTransactionsClientOptions) {
    this.baseUrl = options.config.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport;
    this.tokens = options.tokens;
  }

  /** Retrieves a transaction by its Paymob id. */
  async getTransactionById(transactionId: number | string): Promise<unknown> {
    const url = `${this.baseUrl}/api/acceptance/transactions/${encodeURIComponent(String(transactionId))}`;
    const response = await withTokenRetry(this.tokens, (token) =>
      this.transport.send({
        method: 'GET',
        url,
        headers: { Authorization: `Bearer ${token}` },
      }),
    );
    return this.unwrap(response, 'Transaction lookup failed');
  }

  /**
   * Retrieves a transaction by the special reference given at intent creation,
   * which Paymob reports back as `merchant_order_id`.
   */
  async getTransactionByRef(reference: string): Promise<unknown> {
    const url = `${this.baseUrl}/api/ecommerce/orders/transaction_inquiry`;
    const response = await withTokenRetry(this.tokens, (token) =>
      this.transport.send({
        method: 'POST',
        url,
        headers: { Authorization: `Bearer ${token}` },
        body: { merchant_order_id: reference },
      }),
    );
    return this.unwrap(response, 'Transaction inquiry failed');
  }

  private unwrap(response: TransportResponse, message: string): unknown {
    if (!isSuccessStatus(response.status)) {
      log.error('request.failed', { status: response.status });
      throw new PaymobApiError(`${message}: HTTP ${response.status}`, {
        status: response.status,
        body: response.body,
      });
    }
    return response.body;
  }
}
