import { DeliveryReceipt, Notifier } from '@vigil/monitor-engine';
import { describeError } from '@vigil/shared';

import { FetchLike, isRetryableStatus } from './http.js';
import { SIGNATURE_HEADER, signHmacSha256 } from './webhook-utils.js';

export interface WebhookNotifierOptions {
  url: string;
  secret: string;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Delivers failure notifications as signed JSON POSTs. The signature header
 * carries the hex HMAC-SHA256 of the exact request body.
 */
export class WebhookNotifier implements Notifier {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async deliver(recipient: string, subject: string, body: string): Promise<DeliveryReceipt> {
    const payload = JSON.stringify({
      recipient,
      subject,
      body,
      sentAt: this.now().toISOString(),
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          [SIGNATURE_HEADER]: signHmacSha256(payload, this.options.secret),
        },
        body: payload,
      });
    } catch (error) {
      return {
        status: 'failed',
        reason: `Webhook request failed: ${describeError(error)}`,
        retryable: true,
      };
    }

    if (!response.ok) {
      const text = await response.text();
      return {
        status: 'failed',
        reason: text.length > 0
          ? `Webhook responded ${response.status}: ${text}`
          : `Webhook responded ${response.status}`,
        retryable: isRetryableStatus(response.status),
      };
    }

    return { status: 'delivered' };
  }
}
