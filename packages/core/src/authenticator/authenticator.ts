/**
 * Authenticator - exchanges an identity for a session credential.
 *
 * Performs the login handshake against `<baseUrl>login` and persists the
 * credential the server hands back.
 *
 * @module authenticator/authenticator
 */

import { AuthError, ServerError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { SessionCredential } from '../session_credential';
import type { SessionStore } from '../session_store';
import { buildMethodUrl, parseJsonObject } from '../http';
import type { FetchFn, HttpResponse } from '../http';
import type { AuthenticatorOptions, Identity } from './authenticator.types';

export const LOGIN_METHOD = 'login';

/**
 * @example
 * ```typescript
 * const authenticator = new Authenticator({ baseUrl, userAgent, sessionStore });
 * const credential = await authenticator.authenticate({ username, password }, null, true);
 * ```
 */
export class Authenticator {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly sessionStore: SessionStore;
  private readonly formatParam: string;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: AuthenticatorOptions, fetchFn?: FetchFn) {
    this.baseUrl = options.baseUrl;
    this.userAgent = options.userAgent;
    this.sessionStore = options.sessionStore;
    this.formatParam = options.formatParam ?? 'format';
    this.fetchFn = fetchFn ?? ((url, init) => globalThis.fetch(url, init));
    this.logger = options.logger ?? createLogger('[Auth] ');
  }

  /**
   * Returns a usable session credential for `identity`.
   *
   * Without `force`, an existing credential is returned as is and no request
   * is made. Otherwise a login is performed; the existing credential, if any,
   * is sent along so the server can replace it.
   *
   * @throws AuthError when credentials are missing or refused, or no token comes back
   * @throws ServerError when the server cannot be reached or answers garbage
   */
  async authenticate(
    identity: Identity,
    existing: SessionCredential | null,
    force: boolean
  ): Promise<SessionCredential> {
    if (!force && existing) {
      return existing;
    }

    const { username, password } = identity;
    if (!username) {
      throw new AuthError('username must be set', 'MISSING_CREDENTIALS');
    }
    if (!password) {
      throw new AuthError('password must be set', 'MISSING_CREDENTIALS');
    }

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    };
    if (existing) {
      headers['Cookie'] = existing.toCookieHeader();
    }

    const url = buildMethodUrl(this.baseUrl, LOGIN_METHOD, this.formatParam);
    this.logger.debug(`Logging in as ${username} at ${url}`);

    let response: HttpResponse;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers,
        body: new URLSearchParams({ username, password, login: 'Login' }).toString(),
      });
    } catch (error) {
      throw new ServerError(`Unable to reach ${url}: ${errorMessage(error)}`, 'NETWORK_ERROR');
    }

    if (response.status === 403) {
      throw new AuthError('Invalid username/password', 'LOGIN_FAILED');
    }
    if (!response.ok) {
      throw new ServerError(
        `Login request failed: ${response.status} ${response.statusText}`,
        'HTTP_ERROR',
        response.status
      );
    }

    const loginData = parseJsonObject(await response.text());
    if ('message' in loginData) {
      throw new AuthError(
        `Unable to login to server: ${String(loginData['message'])}`,
        'LOGIN_FAILED'
      );
    }

    const credential = SessionCredential.fromSetCookie(response.headers.getSetCookie());
    if (!credential) {
      throw new AuthError(
        'Unable to login to the server. Server did not send back a session token',
        'NO_SESSION_TOKEN'
      );
    }

    this.logger.debug(`Authenticated ${username} (cookies: ${credential.cookieNames().join(', ')})`);
    await this.sessionStore.save(username, credential);
    return credential;
  }
}
