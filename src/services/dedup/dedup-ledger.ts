/**
 * Dedup Ledger
 * In-memory record of listing ids already dispatched. It only grows.
 */

export interface IListingLedger {
  /**
   * Record the id and return true the first time it is seen; false on
   * every later call. Check and insert happen in one synchronous step.
   */
  admit(id: string): boolean;
  has(id: string): boolean;
  readonly size: number;
}

export class DedupLedger implements IListingLedger {
  private readonly admitted = new Set<string>();

  admit(id: string): boolean {
    if (this.admitted.has(id)) {
      return false;
    }
    this.admitted.add(id);
    return true;
  }

  has(id: string): boolean {
    return this.admitted.has(id);
  }

  get size(): number {
    return this.admitted.size;
  }
}
