import { Listing } from '../types/listing';

/**
 * Read/write view of the seen set for the duration of one cycle.
 * markSeen persists before resolving.
 */
export interface SeenSession {
  readonly size: number;
  has(id: string): boolean;
  markSeen(listing: Listing): Promise<void>;
}

export interface SeenHandle extends SeenSession {
  release(): Promise<void>;
}

export interface SeenStore {
  readonly kind: string;
  /** Exclusive access to the seen set until the handle is released */
  acquire(): Promise<SeenHandle>;
}

/**
 * Runs fn with an acquired session and always releases it
 */
export async function withSeenSet<T>(store: SeenStore, fn: (seen: SeenSession) => Promise<T>): Promise<T> {
  const handle = await store.acquire();
  try {
    return await fn(handle);
  } finally {
    await handle.release();
  }
}
