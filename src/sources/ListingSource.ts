import { Listing } from '../types/listing';

/**
 * Something that returns the listings currently visible on the marketplace.
 * Implementations throw FetchError when nothing could be retrieved.
 */
export interface ListingSource {
  readonly name: string;
  fetchListings(): Promise<ListingBatch>;
}

export interface ListingBatch {
  listings: Listing[];
  /** Cards parsed before filtering */
  parsed: number;
  failedQueries: string[];
}
