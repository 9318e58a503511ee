/**
 * Purchase Assist Interface
 * Puts a matched listing's purchase link in front of the user
 */

import type { Listing } from '../adapters/base/feed-client.interface.js';

export type PurchaseAssistMode = 'browser' | 'console';

export interface IPurchaseAssist {
  readonly mode: PurchaseAssistMode;

  /**
   * Present the purchase link. Resolves once the link has been handed off;
   * rejects when it could not be.
   */
  present(url: string, listing: Listing): Promise<void>;
}
