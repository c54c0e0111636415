import { StructuredLogger } from '../core/StructuredLogger';
import { Listing, NotificationEvent } from '../types/listing';
import { formatListingMessage } from './formatMessage';
import { Notifier } from './Notifier';

/**
 * Logs messages instead of sending them; every delivery succeeds.
 */
export class DryRunNotifier implements Notifier {
  readonly channel = 'dry-run';
  private readonly logger: StructuredLogger;
  private delivered: NotificationEvent[] = [];

  constructor(logger: StructuredLogger) {
    this.logger = logger.child('dry-run');
  }

  async notify(listing: Listing): Promise<NotificationEvent> {
    this.logger.info(`Would send: ${formatListingMessage(listing).replace(/\n/g, ' | ')}`, { listingId: listing.id });
    const event: NotificationEvent = {
      listing,
      channel: this.channel,
      dispatchedAt: new Date().toISOString()
    };
    this.delivered.push(event);
    return event;
  }

  async sendText(text: string): Promise<void> {
    this.logger.info(`Would send: ${text.replace(/\n/g, ' | ')}`);
  }

  getDelivered(): NotificationEvent[] {
    return [...this.delivered];
  }
}
