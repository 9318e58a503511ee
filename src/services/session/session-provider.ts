/**
 * Session Provider
 * Owns the marketplace session; the feed client only borrows its credential
 */

import type {
  AccountCredentials,
  Credential,
  IAuthenticator,
} from '../../adapters/base/feed-client.interface.js';
import { logger } from '../../utils/logger.js';
import type { ISessionProvider, Session, SessionState } from './session.types.js';

export class SessionProvider implements ISessionProvider {
  private session: Session = { credential: null, state: 'unknown' };
  private loginPromise: Promise<Credential> | null = null;
  private logins = 0;

  constructor(
    private readonly authenticator: IAuthenticator,
    private readonly account: AccountCredentials,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async acquire(signal?: AbortSignal): Promise<Credential> {
    const { credential, state } = this.session;
    if (state === 'valid' && credential) {
      return credential;
    }

    // Coalesce concurrent callers onto one login
    if (!this.loginPromise) {
      this.loginPromise = this.login(signal).finally(() => {
        this.loginPromise = null;
      });
    }
    return this.loginPromise;
  }

  invalidate(rejected?: Credential): void {
    const { credential } = this.session;
    if (!credential) return;
    if (rejected && rejected !== credential) {
      logger.debug('[Session] Ignoring rejection of a superseded credential');
      return;
    }

    this.session = { credential, state: 'expired' };
    logger.info('[Session] Credential marked expired');
  }

  getState(): SessionState {
    return this.session.state;
  }

  getLoginCount(): number {
    return this.logins;
  }

  private async login(signal?: AbortSignal): Promise<Credential> {
    const reason = this.session.state === 'expired' ? 're-authenticating' : 'authenticating';
    logger.info(`[Session] ${reason} as ${this.account.user}`);

    // SessionError and exhausted transient failures propagate to the caller
    const token = await this.authenticator.login(this.account, signal);
    const credential: Credential = { token, issuedAt: this.now() };

    this.session = { credential, state: 'valid' };
    this.logins++;
    logger.info('[Session] Authentication successful');

    return credential;
  }
}
