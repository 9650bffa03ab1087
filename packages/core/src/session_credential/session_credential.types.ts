/**
 * A single cookie issued by the server.
 *
 * Attribute names are lower-cased; flag attributes such as HttpOnly are
 * stored as `true`.
 */
export type SessionCookie = {
  name: string;
  value: string;
  attributes: Record<string, string | true>;
};

/**
 * Persisted form of a SessionCredential.
 */
export type SessionCredentialData = {
  cookies: SessionCookie[];
};
