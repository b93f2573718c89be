/**
 * Single-flight token: at most one owner at a time.
 *
 * Check-and-set is not atomic; it does not need to be, because every caller
 * runs on the one Node event loop and acquires within a single call frame.
 */
export class SingleFlight<T> {
  private owner: T | null = null;

  get isHeld(): boolean {
    return this.owner !== null;
  }

  current(): T | null {
    return this.owner;
  }

  /**
   * Take the token for `owner`. Returns false if someone else holds it.
   */
  tryAcquire(owner: T): boolean {
    if (this.owner !== null) {
      return false;
    }
    this.owner = owner;
    return true;
  }

  /**
   * Give the token back. A stale owner cannot release someone else's token.
   */
  release(owner: T): void {
    if (this.owner === owner) {
      this.owner = null;
    }
  }
}
