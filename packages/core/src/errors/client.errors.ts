/**
 * Error taxonomy for talking to the package database service.
 *
 * - ServerError: the server could not be reached or answered with something
 *   that is not a usable JSON payload.
 * - AuthError: no session could be established or re-established.
 * - AppError: the server reported an application-level exception inside an
 *   otherwise successful response.
 * - PackageDBError: the domain client rejected its input before any request.
 */

export type ServerErrorCode = 'HTTP_ERROR' | 'NETWORK_ERROR' | 'INVALID_RESPONSE';

export type AuthErrorCode =
  | 'MISSING_CREDENTIALS'
  | 'LOGIN_FAILED'
  | 'NO_SESSION_TOKEN'
  | 'REAUTH_FAILED';

export type ClientErrorCode = ServerErrorCode | AuthErrorCode | 'APP_ERROR' | 'PACKAGEDB_ERROR';

/**
 * Base class for every failure surfaced by the client.
 */
export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: ClientErrorCode
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

/**
 * Unable to talk to the server properly.
 */
export class ServerError extends ClientError {
  constructor(
    message: string,
    code: ServerErrorCode,
    /** HTTP status code (if the server answered at all) */
    public readonly status?: number
  ) {
    super(message, code);
    this.name = 'ServerError';
  }
}

/**
 * Error during authentication, for instance an invalid password.
 */
export class AuthError extends ClientError {
  constructor(message: string, code: AuthErrorCode) {
    super(message, code);
    this.name = 'AuthError';
  }
}

/**
 * Error condition that the server is passing back to the client.
 */
export class AppError extends ClientError {
  constructor(
    /** Exception name reported by the server, e.g. "PackageDBError" */
    public readonly appName: string,
    message: string,
    public readonly extras?: unknown
  ) {
    super(message, 'APP_ERROR');
    this.name = 'AppError';
  }
}

/**
 * Errors generated locally by the PackageDB client.
 */
export class PackageDBError extends ClientError {
  constructor(message: string) {
    super(message, 'PACKAGEDB_ERROR');
    this.name = 'PackageDBError';
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
