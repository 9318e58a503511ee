/**
 * Session Types
 */

import type { Credential } from '../../adapters/base/feed-client.interface.js';

export type SessionState = 'valid' | 'expired' | 'unknown';

export interface Session {
  credential: Credential | null;
  state: SessionState;
}

export interface ISessionProvider {
  /** A usable credential, logging in first when none is valid */
  acquire(signal?: AbortSignal): Promise<Credential>;

  /**
   * Mark the held credential expired. Passing the credential that was
   * rejected keeps a stale rejection from expiring a newer login.
   */
  invalidate(rejected?: Credential): void;

  getState(): SessionState;

  /** Completed logins since start */
  getLoginCount(): number;
}
