import type { SessionCookie, SessionCredentialData } from './session_credential.types';

/**
 * Parses one Set-Cookie header line. Returns null when the line carries no
 * `name=value` pair.
 */
export function parseSetCookie(line: string): SessionCookie | null {
  const [pair, ...attributeParts] = line.split(';');
  if (!pair) {
    return null;
  }

  const separator = pair.indexOf('=');
  if (separator <= 0) {
    return null;
  }

  const name = pair.slice(0, separator).trim();
  const value = pair.slice(separator + 1).trim();
  if (!name) {
    return null;
  }

  const attributes: Record<string, string | true> = {};
  for (const part of attributeParts) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) {
      attributes[trimmed.toLowerCase()] = true;
    } else {
      attributes[trimmed.slice(0, eq).trim().toLowerCase()] = trimmed.slice(eq + 1).trim();
    }
  }

  return { name, value, attributes };
}

function cloneCookie(cookie: SessionCookie): SessionCookie {
  return { name: cookie.name, value: cookie.value, attributes: { ...cookie.attributes } };
}

function sameCookie(a: SessionCookie, b: SessionCookie): boolean {
  const keys = Object.keys(a.attributes);
  if (a.value !== b.value || keys.length !== Object.keys(b.attributes).length) {
    return false;
  }
  return keys.every(
    (key) => Object.hasOwn(b.attributes, key) && a.attributes[key] === b.attributes[key],
  );
}

/**
 * Opaque session token issued by the server: the set of cookies a login
 * (or a later response) handed back.
 *
 * Instances are immutable. Renewal produces a new credential via merge().
 *
 * @example
 * ```typescript
 * const credential = SessionCredential.fromSetCookie(response.headers.getSetCookie());
 * if (credential) {
 *   headers['Cookie'] = credential.toCookieHeader();
 * }
 * ```
 */
export class SessionCredential {
  private readonly cookies: ReadonlyArray<SessionCookie>;

  private constructor(cookies: SessionCookie[]) {
    this.cookies = cookies.map(cloneCookie);
  }

  /**
   * Builds a credential from Set-Cookie header lines.
   * @returns The credential, or null if no line contained a cookie
   */
  static fromSetCookie(lines: readonly string[]): SessionCredential | null {
    const credential = new SessionCredential([]).merge(lines);
    return credential.isEmpty() ? null : credential;
  }

  /**
   * Restores a credential from its persisted form.
   */
  static fromJSON(data: SessionCredentialData): SessionCredential {
    return new SessionCredential(data.cookies);
  }

  /**
   * Returns a new credential where cookies named in `lines` replace the
   * current ones and every other cookie is kept.
   */
  merge(lines: readonly string[]): SessionCredential {
    const byName = new Map<string, SessionCookie>();
    for (const cookie of this.cookies) {
      byName.set(cookie.name, cookie);
    }
    for (const line of lines) {
      const cookie = parseSetCookie(line);
      if (cookie) {
        byName.set(cookie.name, cookie);
      }
    }
    return new SessionCredential([...byName.values()]);
  }

  /**
   * Renders the credential as a request `Cookie` header value.
   * Attribute metadata is never sent back to the server.
   */
  toCookieHeader(): string {
    return this.cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }

  /** Cookie names, safe to log. */
  cookieNames(): string[] {
    return this.cookies.map((cookie) => cookie.name);
  }

  isEmpty(): boolean {
    return this.cookies.length === 0;
  }

  /**
   * Compares cookies by name. Cookie order and attribute order are ignored.
   */
  equals(other: SessionCredential): boolean {
    const theirs = new Map(other.cookies.map((cookie) => [cookie.name, cookie]));
    if (theirs.size !== new Set(this.cookieNames()).size) {
      return false;
    }
    return this.cookies.every((cookie) => {
      const match = theirs.get(cookie.name);
      return match !== undefined && sameCookie(cookie, match);
    });
  }

  toJSON(): SessionCredentialData {
    return { cookies: this.cookies.map(cloneCookie) };
  }
}
