import type { Logger } from '../logger';
import type { SessionStore } from '../session_store';
import type { FetchFn } from '../http';

/**
 * Username/password pair. Either part may be absent (anonymous client).
 */
export type Identity = {
  username?: string | undefined;
  password?: string | undefined;
};

/**
 * Configuration options for Authenticator.
 */
export type AuthenticatorOptions = {
  /** Base of every URL used to contact the server */
  baseUrl: string;
  userAgent: string;
  /** Where freshly issued credentials are persisted */
  sessionStore: SessionStore;
  /** Name of the JSON format query parameter. Default: 'format' */
  formatParam?: string;
  logger?: Logger;
};
