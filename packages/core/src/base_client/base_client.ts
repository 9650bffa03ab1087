/**
 * BaseClient - authenticated request dispatch for the service.
 *
 * Every call goes to `<baseUrl><method>?<formatParam>=json` and must answer
 * with a JSON object. A stale session (HTTP 403, or a `logging_in` payload)
 * is healed by exactly one forced re-authentication and replay of the call;
 * a second stale answer for the same call is fatal.
 *
 * @module base_client/base_client
 */

import { AppError, AuthError, ServerError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { Authenticator } from '../authenticator';
import type { SessionCredential } from '../session_credential';
import { FsSessionStore, MemorySessionStore } from '../session_store';
import type { SessionStore } from '../session_store';
import { buildMethodUrl, encodeParams, hasParams, normalizeBaseUrl, parseJsonObject } from '../http';
import type { FetchFn, HttpResponse, JsonObject } from '../http';
import { VERSION } from '../version';
import type { BaseClientOptions, DispatchAttempt, SendRequestOptions } from './base_client.types';

/**
 * A client for the session-cookie authenticated JSON service.
 *
 * @example
 * ```typescript
 * const client = await new BaseClient({
 *   baseUrl: 'https://pkgdb.example.org/pkgdb/',
 *   username: 'alice',
 *   password: process.env['PKGDB_PASSWORD'],
 * }).initialize();
 *
 * const data = await client.sendRequest('acls/name/bash');
 * await client.logout();
 * ```
 */
export class BaseClient {
  readonly baseUrl: string;
  readonly username: string | undefined;
  readonly userAgent: string;
  protected readonly logger: Logger;

  private readonly password: string | undefined;
  private readonly formatParam: string;
  private readonly sessionStore: SessionStore;
  private readonly authenticator: Authenticator;
  private readonly fetchFn: FetchFn;
  private sessionCredential: SessionCredential | null = null;
  private sessionLoaded = false;

  constructor(options: BaseClientOptions, fetchFn?: FetchFn) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.username = options.username;
    this.password = options.password;
    this.userAgent = options.userAgent ?? `pkgdb-client BaseClient/${VERSION}`;
    this.formatParam = options.formatParam ?? 'format';
    this.logger = options.logger ?? createLogger('[Client] ', options.debug ? 'debug' : undefined);
    this.fetchFn = fetchFn ?? ((url, init) => globalThis.fetch(url, init));

    if (options.sessionStore) {
      this.sessionStore = options.sessionStore;
    } else if (options.cacheSession === false) {
      this.sessionStore = new MemorySessionStore();
    } else {
      this.sessionStore = new FsSessionStore({ logger: this.logger });
    }

    this.authenticator = new Authenticator(
      {
        baseUrl: this.baseUrl,
        userAgent: this.userAgent,
        sessionStore: this.sessionStore,
        formatParam: this.formatParam,
        logger: this.logger,
      },
      this.fetchFn
    );
  }

  /**
   * Loads the persisted session for `username` and, when a password is
   * also known, establishes a fresh one.
   */
  async initialize(): Promise<this> {
    await this.loadSession();
    if (this.username && this.password) {
      await this.authenticate(true);
    }
    return this;
  }

  /** Current in-memory session credential, if any. */
  get session(): SessionCredential | null {
    return this.sessionCredential;
  }

  /**
   * Returns an authenticated session credential, logging in when `force` is
   * set or no credential is held.
   *
   * @throws AuthError if username or password is missing, or login fails
   */
  async authenticate(force = false): Promise<SessionCredential> {
    await this.loadSession();
    this.sessionCredential = await this.authenticator.authenticate(
      { username: this.username, password: this.password },
      this.sessionCredential,
      force
    );
    return this.sessionCredential;
  }

  /**
   * Logs out from the server. An AuthError is ignored since the point is to
   * drop the session anyway.
   */
  async logout(): Promise<void> {
    try {
      await this.sendRequest('logout', { auth: true });
    } catch (error) {
      if (error instanceof AuthError) {
        this.logger.debug(`Ignoring authentication failure during logout: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  /**
   * Makes an HTTP request to a server method.
   *
   * @param method - URL fragment after the base URL, e.g. 'acls/name/bash'
   * @throws AuthError if a session cannot be (re-)established
   * @throws ServerError on transport failures or a non-JSON answer
   * @throws AppError when the server reports an application exception
   */
  async sendRequest(method: string, options: SendRequestOptions = {}): Promise<JsonObject> {
    await this.loadSession();
    return this.dispatch(method, options, 'initial');
  }

  private async dispatch(
    method: string,
    options: SendRequestOptions,
    attempt: DispatchAttempt
  ): Promise<JsonObject> {
    const url = buildMethodUrl(this.baseUrl, method, this.formatParam);
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    const init: RequestInit = { method: 'GET', headers };
    if (hasParams(options.params)) {
      init.method = 'POST';
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      init.body = encodeParams(options.params).toString();
    }

    if (options.auth) {
      const credential = await this.authenticate();
      headers['Cookie'] = credential.toCookieHeader();
    } else if (this.sessionCredential) {
      // Sent even when not required so the server can track the visit
      headers['Cookie'] = this.sessionCredential.toCookieHeader();
    }

    this.logger.debug(`Creating request ${url} (${attempt})`);
    let response: HttpResponse;
    try {
      response = await this.fetchFn(url, init);
    } catch (error) {
      throw new ServerError(`Unable to reach ${url}: ${errorMessage(error)}`, 'NETWORK_ERROR');
    }

    if (response.status === 403) {
      return this.retryAfterReauthentication(method, options, attempt, `${response.status} ${response.statusText}`);
    }
    if (!response.ok) {
      throw new ServerError(
        `Request to ${method} failed: ${response.status} ${response.statusText}`,
        'HTTP_ERROR',
        response.status
      );
    }

    this.renewSession(response);

    const data = parseJsonObject(await response.text());

    if ('exc' in data) {
      const flash = data['tg_flash'];
      throw new AppError(String(data['exc']), typeof flash === 'string' ? flash : '', data);
    }

    if ('logging_in' in data) {
      return this.retryAfterReauthentication(method, options, attempt, 'session expired');
    }

    return data;
  }

  private async retryAfterReauthentication(
    method: string,
    options: SendRequestOptions,
    attempt: DispatchAttempt,
    reason: string
  ): Promise<JsonObject> {
    if (attempt === 'retry') {
      // authenticate() throws on a refused login, so a fresh session being
      // rejected again means the server and client disagree about the protocol
      this.logger.error(`Session rejected again after re-authentication for ${method}: ${reason}`);
      throw new AuthError(`Unable to log into server: ${reason}`, 'REAUTH_FAILED');
    }
    this.logger.debug(`Session rejected for ${method} (${reason}); re-authenticating`);
    await this.authenticate(true);
    return this.dispatch(method, options, 'retry');
  }

  /**
   * Picks up a renewed session cookie from any response. Cookies sent to a
   * client without a session are not a login and are ignored.
   */
  private renewSession(response: HttpResponse): void {
    const setCookie = response.headers.getSetCookie();
    if (setCookie.length === 0 || !this.sessionCredential) {
      return;
    }
    this.sessionCredential = this.sessionCredential.merge(setCookie);
  }

  private async loadSession(): Promise<void> {
    if (this.sessionLoaded) {
      return;
    }
    this.sessionLoaded = true;
    if (this.username && !this.sessionCredential) {
      this.sessionCredential = await this.sessionStore.load(this.username);
    }
  }
}
