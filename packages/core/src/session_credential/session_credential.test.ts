import { SessionCredential, parseSetCookie } from './session_credential';

describe('SessionCredential', () => {
  describe('parseSetCookie', () => {
    it('should split name, value and attributes', () => {
      const cookie = parseSetCookie('tg-visit=abc123; Path=/pkgdb; HttpOnly; Max-Age=3600');

      expect(cookie).toEqual({
        name: 'tg-visit',
        value: 'abc123',
        attributes: { path: '/pkgdb', httponly: true, 'max-age': '3600' },
      });
    });

    it('should keep "=" characters inside the value', () => {
      expect(parseSetCookie('token=a=b==; Secure')?.value).toBe('a=b==');
    });

    it('should return null for a line without a name=value pair', () => {
      expect(parseSetCookie('HttpOnly')).toBeNull();
      expect(parseSetCookie('=orphan')).toBeNull();
      expect(parseSetCookie('')).toBeNull();
    });
  });

  describe('fromSetCookie', () => {
    it('should return null when no line parses', () => {
      expect(SessionCredential.fromSetCookie([])).toBeNull();
      expect(SessionCredential.fromSetCookie(['garbage'])).toBeNull();
    });

    it('should render every cookie into the request header without attributes', () => {
      const credential = SessionCredential.fromSetCookie([
        'tg-visit=abc; Path=/',
        'session=xyz; HttpOnly',
      ]);

      expect(credential?.toCookieHeader()).toBe('tg-visit=abc; session=xyz');
      expect(credential?.cookieNames()).toEqual(['tg-visit', 'session']);
    });
  });

  describe('merge', () => {
    it('should replace cookies of the same name and keep the others', () => {
      const original = SessionCredential.fromSetCookie(['tg-visit=old; Path=/', 'lang=en']);
      if (!original) throw new Error('expected a credential');

      const renewed = original.merge(['tg-visit=new; Path=/']);

      expect(renewed.toCookieHeader()).toBe('tg-visit=new; lang=en');
      expect(original.toCookieHeader()).toBe('tg-visit=old; lang=en');
    });

    it('should return an equal credential when nothing parses', () => {
      const original = SessionCredential.fromSetCookie(['tg-visit=abc']);
      if (!original) throw new Error('expected a credential');

      expect(original.merge(['junk']).equals(original)).toBe(true);
    });
  });

  describe('equals', () => {
    it('should ignore cookie order and attribute order', () => {
      const a = SessionCredential.fromJSON({
        cookies: [
          { name: 'tg-visit', value: 'abc', attributes: { path: '/', httponly: true } },
          { name: 'lang', value: 'en', attributes: {} },
        ],
      });
      const b = SessionCredential.fromJSON({
        cookies: [
          { name: 'lang', value: 'en', attributes: {} },
          { name: 'tg-visit', value: 'abc', attributes: { httponly: true, path: '/' } },
        ],
      });

      expect(a.equals(b)).toBe(true);
      expect(b.equals(a)).toBe(true);
    });

    it('should tell apart credentials whose values or attributes differ', () => {
      const base = SessionCredential.fromJSON({
        cookies: [{ name: 'tg-visit', value: 'abc', attributes: { path: '/' } }],
      });
      const otherValue = SessionCredential.fromJSON({
        cookies: [{ name: 'tg-visit', value: 'xyz', attributes: { path: '/' } }],
      });
      const otherAttribute = SessionCredential.fromJSON({
        cookies: [{ name: 'tg-visit', value: 'abc', attributes: { path: '/pkgdb' } }],
      });
      const extraAttribute = SessionCredential.fromJSON({
        cookies: [{ name: 'tg-visit', value: 'abc', attributes: { path: '/', secure: true } }],
      });
      const extraCookie = SessionCredential.fromJSON({
        cookies: [
          { name: 'tg-visit', value: 'abc', attributes: { path: '/' } },
          { name: 'lang', value: 'en', attributes: {} },
        ],
      });

      expect(base.equals(otherValue)).toBe(false);
      expect(base.equals(otherAttribute)).toBe(false);
      expect(base.equals(extraAttribute)).toBe(false);
      expect(base.equals(extraCookie)).toBe(false);
      expect(extraCookie.equals(base)).toBe(false);
    });
  });

  describe('serialization', () => {
    it('should restore an equal credential from its JSON form', () => {
      const credential = SessionCredential.fromSetCookie(['tg-visit=abc; Path=/; HttpOnly']);
      if (!credential) throw new Error('expected a credential');

      const restored = SessionCredential.fromJSON(JSON.parse(JSON.stringify(credential)));

      expect(restored.equals(credential)).toBe(true);
      expect(restored.toJSON()).toEqual({
        cookies: [{ name: 'tg-visit', value: 'abc', attributes: { path: '/', httponly: true } }],
      });
    });
  });
});
