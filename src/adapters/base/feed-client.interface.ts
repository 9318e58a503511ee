/**
 * Feed Client Interface
 * Defines the contract between the monitoring loop and a marketplace integration
 */

// ============================================================================
// Configuration Types
// ============================================================================

export interface MarketplaceConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  userAgent: string;
  /** Per-request timeout in ms */
  timeout: number;
  /** Retries for transient failures inside one request */
  retryAttempts: number;
  /** Initial retry delay in ms */
  retryDelay: number;
  /** Minimum spacing between successive fetch() calls in ms */
  minRequestSpacing: number;
}

// ============================================================================
// Listing Types
// ============================================================================

export type DeliveryMethod = 'electronic' | 'meetup' | 'other';

export interface Listing {
  /** Stable per offer; the dedup key */
  readonly id: string;
  /** Per-ticket price in the event currency, null when the feed omitted it */
  readonly price: number | null;
  readonly currency: string;
  /** Number of tickets in the offer, null when unparseable */
  readonly seatCount: number | null;
  /** null when the inventory lookup was skipped for this entry */
  readonly deliveryMethod: DeliveryMethod | null;
  readonly purchaseUrl: string;
  readonly section: string;
  readonly row: string;
  readonly area: string;
  readonly ticketType: string;
  readonly capturedAt: Date;
}

/** The part of a listing known before the per-listing inventory lookup */
export type ListingSummary = Pick<Listing, 'id' | 'price' | 'seatCount'>;

export interface FetchOptions {
  signal?: AbortSignal;
  /**
   * Decides which feed entries are worth an inventory lookup.
   * Rejected entries are still returned, unresolved.
   */
  prefilter?: (summary: ListingSummary) => boolean;
}

// ============================================================================
// Credential Types
// ============================================================================

export interface AccountCredentials {
  user: string;
  password: string;
}

export interface Credential {
  readonly token: string;
  readonly issuedAt: Date;
}

// ============================================================================
// Interfaces
// ============================================================================

export interface IAuthenticator {
  /**
   * Log in and return a session token
   * @throws SessionError when the marketplace rejects the account
   * @throws TransientError / RateLimitError when login could not complete
   */
  login(account: AccountCredentials, signal?: AbortSignal): Promise<string>;
}

export interface IFeedClient {
  readonly config: MarketplaceConfig;

  /**
   * Fetch the current listings for an event, in feed order.
   * An event with nothing listed yields an empty array.
   * @throws AuthError, RateLimitError, TransientError, InvalidEventError
   */
  fetch(eventId: string, credential: Credential, options?: FetchOptions): Promise<Listing[]>;

  /** Public event page, used when no purchase link is known */
  eventUrl(eventId: string): string;
}
