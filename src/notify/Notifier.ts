import { Listing, NotificationEvent } from '../types/listing';

/**
 * A delivery channel. notify() resolves only once delivery is confirmed and
 * rejects with DeliveryError otherwise.
 */
export interface Notifier {
  readonly channel: string;
  notify(listing: Listing): Promise<NotificationEvent>;
  sendText(text: string): Promise<void>;
}
