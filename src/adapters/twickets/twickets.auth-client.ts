/**
 * Twickets Auth Client
 * Implements IAuthenticator against the Twickets login endpoint
 */

import type { AxiosInstance } from 'axios';
import type {
  AccountCredentials,
  IAuthenticator,
  MarketplaceConfig,
} from '../base/feed-client.interface.js';
import { createResiliencePolicies, type ResiliencePolicies } from '../base/circuit-breaker.js';
import {
  SessionError,
  isTransientFailure,
  toFeedError,
  type SessionFailure,
} from '../base/feed-errors.js';
import { logger, logAdapterOperation } from '../../utils/logger.js';
import {
  PLATFORM_NAME,
  createTwicketsHttpClient,
  withErrorMapping,
  type TwicketsClientDeps,
} from './twickets.http.js';
import type { TwicketsLoginRequest, TwicketsLoginResponse } from './twickets.types.js';

/**
 * Decide why a login without a token failed, from the status and the
 * marketplace's description text
 */
export function classifyLoginFailure(status: number, description?: string): SessionFailure {
  const text = (description ?? '').toLowerCase();

  if (/lock|suspend|disabled|blocked/.test(text)) return 'locked';
  if (/verif|two.?factor|2fa|one.?time|otp/.test(text)) return 'second_factor';
  if (status >= 200 && status < 300) return 'no_token';
  return 'rejected';
}

export class TwicketsAuthClient implements IAuthenticator {
  private client: AxiosInstance;
  private resilience: ResiliencePolicies;

  constructor(private readonly config: MarketplaceConfig, deps: TwicketsClientDeps = {}) {
    this.resilience = createResiliencePolicies({
      label: `${PLATFORM_NAME}-auth`,
      handles: isTransientFailure,
      attemptTimeoutMs: config.timeout,
      retry: { attempts: Math.max(config.retryAttempts, 1), initialDelayMs: config.retryDelay },
      breaker: { threshold: 3 },
    });

    this.client = createTwicketsHttpClient(config, deps.adapter);
  }

  async login(account: AccountCredentials, signal?: AbortSignal): Promise<string> {
    const startTime = Date.now();
    const context = { platform: PLATFORM_NAME, operation: 'login' } as const;
    const origin = new URL(this.config.baseUrl).origin;

    const body: TwicketsLoginRequest = {
      login: account.user,
      password: account.password,
      accountType: 'U',
    };

    logger.info(`[Twickets] Logging in as ${account.user}`);

    try {
      const response = await this.resilience.execute(
        (attemptSignal) => withErrorMapping(context, () =>
          this.client.post<TwicketsLoginResponse>('/services/auth/login', body, {
            params: { api_key: this.config.apiKey },
            headers: {
              Origin: origin,
              Referer: `${origin}/app/login`,
            },
            signal: attemptSignal,
            // Rejected logins come back as 4xx with a description
            validateStatus: status => status < 500 && status !== 429,
          }),
        ),
        signal,
      );

      const token = response.data?.responseData;
      if (response.status >= 200 && response.status < 300 && typeof token === 'string' && token.length > 0) {
        logAdapterOperation(PLATFORM_NAME, 'login', startTime, true);
        logger.info(`[Twickets] Login successful, token ${token.slice(0, 8)}...`);
        return token;
      }

      const description = response.data?.description;
      const reason = classifyLoginFailure(response.status, description);
      throw new SessionError(
        reason,
        `Login failed (HTTP ${response.status})${description ? `: ${description}` : ''}`,
      );
    } catch (error) {
      logAdapterOperation(PLATFORM_NAME, 'login', startTime, false, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw toFeedError(error, context);
    }
  }
}
