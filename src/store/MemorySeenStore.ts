import { StoreError } from '../core/errors';
import { Listing } from '../types/listing';
import { SeenHandle, SeenStore } from './SeenStore';

/**
 * Process-local seen set, for dry runs and tests
 */
export class MemorySeenStore implements SeenStore {
  readonly kind = 'memory';
  private readonly ids: Set<string>;
  private held = false;

  constructor(initial: Iterable<string> = []) {
    this.ids = new Set(initial);
  }

  async acquire(): Promise<SeenHandle> {
    if (this.held) {
      throw new StoreError('Seen set is already held by another cycle');
    }
    this.held = true;

    const ids = this.ids;
    let released = false;
    return {
      get size() {
        return ids.size;
      },
      has: (id: string) => ids.has(id),
      markSeen: async (listing: Listing) => {
        if (released) throw new StoreError('Seen set handle used after release');
        ids.add(listing.id);
      },
      release: async () => {
        if (released) return;
        released = true;
        this.held = false;
      }
    };
  }

  snapshot(): string[] {
    return Array.from(this.ids);
  }
}
