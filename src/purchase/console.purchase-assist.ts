/**
 * Console Purchase Assist
 * Used when running headless: the link is written to the log for a human to follow
 */

import type { Listing } from '../adapters/base/feed-client.interface.js';
import { logger } from '../utils/logger.js';
import type { IPurchaseAssist, PurchaseAssistMode } from './purchase-assist.interface.js';

export class ConsolePurchaseAssist implements IPurchaseAssist {
  readonly mode: PurchaseAssistMode = 'console';

  async present(url: string, listing: Listing): Promise<void> {
    logger.info(`[Purchase] Listing ${listing.id} ready to buy: ${url}`, {
      listingId: listing.id,
      url,
    });
  }
}
