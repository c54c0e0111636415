import { DeliveryError, FetchError } from './errors';
import { StructuredLogger } from './StructuredLogger';
import { Notifier } from '../notify/Notifier';
import { ListingSource } from '../sources/ListingSource';
import { SeenSession } from '../store/SeenStore';
import { CycleResult, Listing } from '../types/listing';

export interface PollCycleDeps {
  source: ListingSource;
  seen: SeenSession;
  notifier: Notifier;
  logger: StructuredLogger;
}

/**
 * One fetch, filter, notify pass. An id enters the seen set only after its
 * notification was confirmed, so a crash or a failed send means the listing
 * is sent again next time rather than lost.
 *
 * FetchError and DeliveryError are handled here; anything else (StoreError
 * in practice) propagates to the caller.
 */
export async function runPollCycle({ source, seen, notifier, logger }: PollCycleDeps): Promise<CycleResult> {
  const startedAt = Date.now();
  const result: CycleResult = {
    fetched: 0,
    matched: 0,
    fresh: 0,
    notified: 0,
    failed: 0,
    skipped: false,
    failedQueries: [],
    durationMs: 0
  };

  let listings: Listing[];
  try {
    const batch = await source.fetchListings();
    listings = batch.listings;
    result.fetched = batch.parsed;
    result.matched = batch.listings.length;
    result.failedQueries = batch.failedQueries;
    if (batch.failedQueries.length > 0) {
      logger.warn(`${batch.failedQueries.length} search page(s) failed, continuing with the rest`, {
        failed: batch.failedQueries.join(', ')
      });
    }
  } catch (error) {
    if (!(error instanceof FetchError)) throw error;

    logger.error('Fetch failed, skipping cycle', error, { source: source.name });
    result.skipped = true;
    result.error = error.message;
    result.durationMs = Date.now() - startedAt;
    return result;
  }

  const fresh = uniqueUnseen(listings, seen);
  result.fresh = fresh.length;
  logger.info(`Found ${fresh.length} new ad(s)`, { matched: result.matched, known: seen.size });

  for (const listing of fresh) {
    try {
      const event = await notifier.notify(listing);
      logger.debug('Notification delivered', { id: listing.id, channel: event.channel, messageId: event.messageId });
    } catch (error) {
      if (!(error instanceof DeliveryError)) throw error;

      result.failed++;
      logger.error('Delivery failed, will retry next cycle', error, { id: listing.id, status: error.status });
      continue;
    }

    await seen.markSeen(listing);
    result.notified++;
    logger.info('Sent ad', { id: listing.id, title: listing.title });
  }

  result.durationMs = Date.now() - startedAt;
  if (result.failed > 0) {
    result.error = `${result.failed} delivery failure(s)`;
  }
  return result;
}

/**
 * Drops listings already in the seen set and repeats within the batch,
 * keeping the first occurrence.
 */
export function uniqueUnseen(listings: Listing[], seen: Pick<SeenSession, 'has'>): Listing[] {
  const picked = new Set<string>();
  const fresh: Listing[] = [];

  for (const listing of listings) {
    if (seen.has(listing.id) || picked.has(listing.id)) continue;
    picked.add(listing.id);
    fresh.push(listing);
  }

  return fresh;
}

export function describeCycle(result: CycleResult): string {
  if (result.skipped) {
    return `skipped (${result.error ?? 'fetch failed'})`;
  }
  const pages = result.failedQueries.length > 0 ? ` pages_failed=${result.failedQueries.length}` : '';
  return `fetched=${result.fetched} matched=${result.matched} new=${result.fresh} notified=${result.notified} failed=${result.failed}${pages} in ${result.durationMs}ms`;
}
