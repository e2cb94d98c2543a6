export type ClaimResult =
  | { claimed: true }
  | { claimed: false; holder: string };

/**
 * First-seen owner of each perceptual hash, scoped to one download run.
 *
 * `claim` does its lookup and insert without yielding, so download tasks
 * running concurrently on the event loop cannot interleave between the two.
 * Fetching and hashing happen outside of it.
 */
export class HashRegistry {
  private readonly holders = new Map<string, string>();

  claim(hash: string, filePath: string): ClaimResult {
    const holder = this.holders.get(hash);
    if (holder !== undefined) {
      return { claimed: false, holder };
    }
    this.holders.set(hash, filePath);
    return { claimed: true };
  }

  get size(): number {
    return this.holders.size;
  }
}
