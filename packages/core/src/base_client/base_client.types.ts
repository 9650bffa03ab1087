import type { Logger } from '../logger';
import type { SessionStore } from '../session_store';
import type { RequestParams } from '../http';

/**
 * Configuration options for BaseClient.
 */
export type BaseClientOptions = {
  /** Base of every URL used to contact the server */
  baseUrl: string;
  /** Username for establishing authenticated connections */
  username?: string | undefined;
  /** Password to use with authenticated connections */
  password?: string | undefined;
  /** User agent string. Default: 'pkgdb-client BaseClient/<version>' */
  userAgent?: string | undefined;
  /** If true, log debug information */
  debug?: boolean | undefined;
  /** Backend for persisted sessions. Default: FsSessionStore at ~/.pkgdb_session.json */
  sessionStore?: SessionStore | undefined;
  /** If false, sessions are only kept in memory. Default: true */
  cacheSession?: boolean | undefined;
  /** Name of the JSON format query parameter. Default: 'format' */
  formatParam?: string | undefined;
  logger?: Logger | undefined;
};

export type SendRequestOptions = {
  /** If true, make the request with an authenticated session */
  auth?: boolean;
  /** Extra parameters to send to the server. Their presence makes the call a POST */
  params?: RequestParams | undefined;
};

/**
 * Whether a dispatch is the first try of a logical call or its single replay
 * after re-authentication.
 */
export type DispatchAttempt = 'initial' | 'retry';
