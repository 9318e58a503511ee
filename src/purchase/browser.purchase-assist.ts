/**
 * Browser Purchase Assist
 * Opens the purchase page in the user's default browser
 */

import open from 'open';
import type { Listing } from '../adapters/base/feed-client.interface.js';
import { validateDeepLink } from '../utils/deep-link-generator.js';
import { logger } from '../utils/logger.js';
import type { IPurchaseAssist, PurchaseAssistMode } from './purchase-assist.interface.js';

export type BrowserLauncher = (url: string) => Promise<unknown>;

export class BrowserPurchaseAssist implements IPurchaseAssist {
  readonly mode: PurchaseAssistMode = 'browser';

  constructor(
    private readonly baseUrl: string,
    private readonly launch: BrowserLauncher = url => open(url),
  ) {}

  async present(url: string, listing: Listing): Promise<void> {
    // Only ever hand the browser a link on the marketplace itself
    if (!validateDeepLink(url, this.baseUrl)) {
      throw new Error(`Refusing to open link outside ${this.baseUrl}: ${url}`);
    }

    await this.launch(url);
    logger.info(`[Purchase] Opened listing ${listing.id} in browser`, { url });
  }
}
