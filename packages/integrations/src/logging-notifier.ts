import { DeliveryReceipt, Notifier } from '@vigil/monitor-engine';
import { Logger } from '@vigil/shared';

/** Writes notifications to the log instead of sending them anywhere. */
export class LoggingNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async deliver(recipient: string, subject: string, body: string): Promise<DeliveryReceipt> {
    this.logger.warn(subject, { recipient, body });
    return { status: 'delivered' };
  }
}
