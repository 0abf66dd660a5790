import { DeliveryReceipt, Notifier } from '@vigil/monitor-engine';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

export interface RetryDependencies {
  sleep(ms: number): Promise<void>;
  random(): number;
}

const defaultDependencies: RetryDependencies = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: () => Math.random(),
};

/**
 * Retries deliveries whose receipt is failed and retryable. Thrown transport
 * errors are not retried and reach the caller unchanged.
 */
export class RetryingNotifier implements Notifier {
  constructor(
    private readonly inner: Notifier,
    private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly dependencies: RetryDependencies = defaultDependencies,
  ) {}

  getBackoffDelayMs(attempt: number): number {
    const exponential = this.policy.initialDelayMs * 2 ** (attempt - 1);
    const capped = Math.min(exponential, this.policy.maxDelayMs);
    const jitter = Math.floor(capped * 0.1 * this.dependencies.random());
    return Math.min(capped + jitter, this.policy.maxDelayMs);
  }

  async deliver(recipient: string, subject: string, body: string): Promise<DeliveryReceipt> {
    let receipt = await this.inner.deliver(recipient, subject, body);

    for (let attempt = 1; attempt < this.policy.maxAttempts; attempt += 1) {
      if (receipt.status === 'delivered' || !receipt.retryable) {
        return receipt;
      }

      await this.dependencies.sleep(this.getBackoffDelayMs(attempt));
      receipt = await this.inner.deliver(recipient, subject, body);
    }

    return receipt;
  }
}
