/**
 * Twickets Marketplace Adapter
 * Login, listing feed and inventory lookups
 */

export { TwicketsAuthClient, classifyLoginFailure } from './twickets.auth-client.js';
export { TwicketsFeedClient } from './twickets.feed-client.js';
export type { TwicketsClientDeps } from './twickets.http.js';
