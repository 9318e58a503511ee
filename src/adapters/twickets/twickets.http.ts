/**
 * Shared HTTP plumbing for the Twickets clients
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Credential, MarketplaceConfig } from '../base/feed-client.interface.js';
import { toFeedError, type ErrorContext } from '../base/feed-errors.js';

export const PLATFORM_NAME = 'twickets';

export interface TwicketsClientDeps {
  /** Replaces the network transport (tests use an in-process stand-in) */
  adapter?: AxiosAdapter;
  now?: () => Date;
}

export function createTwicketsHttpClient(
  config: MarketplaceConfig,
  adapter?: AxiosAdapter,
): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeout,
    adapter,
    headers: {
      'Accept': 'application/json, text/plain, */*',
      'Content-Type': 'application/json',
      'User-Agent': config.userAgent,
    },
  });
}

export function authHeaders(credential: Credential): Record<string, string> {
  return { Authorization: `Bearer ${credential.token}` };
}

/**
 * Run one HTTP call, converting its failure into the feed taxonomy so the
 * resilience policies can tell transient faults from the rest
 */
export async function withErrorMapping<T>(
  context: ErrorContext,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw toFeedError(error, context);
  }
}
