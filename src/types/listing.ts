export type ISO = string;

export interface Listing {
  /** Card DOM id, or the ad path when the card carries none */
  readonly id: string;
  readonly title: string;
  /** Price as displayed on the card, "N/A" when absent */
  readonly price: string;
  readonly url: string;
  readonly seenAt: ISO;
  /** Search page the listing was found on */
  readonly query: string;
}

export interface NotificationEvent {
  listing: Listing;
  channel: string;
  dispatchedAt: ISO;
  messageId?: number;
}

export interface CycleResult {
  fetched: number;
  matched: number;
  fresh: number;
  notified: number;
  failed: number;
  skipped: boolean;
  /** Search pages that failed while others answered */
  failedQueries: string[];
  durationMs: number;
  error?: string;
}
