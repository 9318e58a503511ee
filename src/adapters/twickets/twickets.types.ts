/**
 * Twickets API Response Types
 * Shapes observed on the public web app's JSON endpoints. Every field is
 * optional: the mapper treats anything missing as unknown.
 */

// ============================================================================
// Envelope
// ============================================================================

export interface TwicketsEnvelope<T> {
  responseData?: T | null;
  responseCode?: number;
  description?: string;
  clock?: string;
}

// ============================================================================
// Auth Types
// ============================================================================

export interface TwicketsLoginRequest {
  login: string;
  password: string;
  accountType: 'U';
}

/** responseData carries the session token */
export type TwicketsLoginResponse = TwicketsEnvelope<string>;

// ============================================================================
// Listing Feed Types
// ============================================================================

export interface TwicketsPrice {
  /** Pence, fees included */
  netSellingPrice?: number;
  grossPrice?: number;
  currencyCode?: string;
}

export interface TwicketsListing {
  /** "<catalogue>@<inventoryId>" */
  id?: string;
  /** Purchasable split sizes; the first is the whole block */
  splits?: Array<number | string>;
  type?: string;
  area?: string;
  section?: string;
  row?: string;
  pricing?: {
    prices?: TwicketsPrice[];
  };
}

export type TwicketsListingsResponse = TwicketsEnvelope<TwicketsListing[]>;

// ============================================================================
// Inventory Types
// ============================================================================

export interface TwicketsDeliveryPlan {
  /** 1 = meet the seller in person */
  deliveryMethod?: number;
  title?: string;
}

export interface TwicketsInventoryResponse {
  available?: boolean;
  block?: {
    blockId?: string;
  } | null;
  deliveryPlan?: TwicketsDeliveryPlan[];
}
