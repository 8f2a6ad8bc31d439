/**
 * Cookie store shared by every request of one session.
 * Each cookie is bound to the host that set it (or to its Domain attribute)
 * and is only sent back to matching hosts.
 */

export interface SetCookie {
  name: string;
  value: string;
  /** Domain attribute, lower-cased, leading dot removed */
  domain?: string;
}

interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
}

function hostOf(url: string): string {
  return new URL(url).hostname.toLowerCase();
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

export class CookieJar {
  private cookies = new Map<string, StoredCookie>();

  /**
   * Initial cookies are bound to the host of `origin`
   */
  constructor(initial: Record<string, string> | null | undefined, origin: string) {
    const domain = hostOf(origin);
    for (const [name, value] of Object.entries(initial ?? {})) {
      this.store({ name, value, domain, hostOnly: true });
    }
  }

  /**
   * Store every Set-Cookie of a response from `url`; returns the cookies it set.
   * A Domain attribute that does not cover the responding host is rejected.
   */
  ingest(headers: Headers, url: string): Record<string, string> {
    const host = hostOf(url);
    const received: Record<string, string> = {};
    for (const raw of headers.getSetCookie()) {
      const parsed = parseSetCookie(raw);
      if (!parsed) continue;
      if (parsed.domain !== undefined && !domainMatches(host, parsed.domain)) continue;

      this.store({
        name: parsed.name,
        value: parsed.value,
        domain: parsed.domain ?? host,
        hostOnly: parsed.domain === undefined,
      });
      received[parsed.name] = parsed.value;
    }
    return received;
  }

  /**
   * Cookie header for a request to `url`; empty when nothing matches
   */
  header(url: string): string {
    const host = hostOf(url);
    return Array.from(this.cookies.values())
      .filter((cookie) => (cookie.hostOnly ? cookie.domain === host : domainMatches(host, cookie.domain)))
      .map(({ name, value }) => `${name}=${value}`)
      .join('; ');
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const { name, value } of this.cookies.values()) {
      record[name] = value;
    }
    return record;
  }

  get size(): number {
    return this.cookies.size;
  }

  private store(cookie: StoredCookie) {
    this.cookies.set(`${cookie.domain}\t${cookie.name}`, cookie);
  }
}

export function parseSetCookie(raw: string): SetCookie | null {
  const [pair, ...attributes] = raw.split(';');
  if (!pair) return null;

  const index = pair.indexOf('=');
  if (index === -1) return null;

  const name = pair.slice(0, index).trim();
  if (!name) return null;

  const cookie: SetCookie = { name, value: pair.slice(index + 1).trim() };
  for (const attribute of attributes) {
    const [key = '', value = ''] = attribute.split('=', 2);
    if (key.trim().toLowerCase() !== 'domain') continue;
    const domain = value.trim().replace(/^\./, '').toLowerCase();
    if (domain) cookie.domain = domain;
  }
  return cookie;
}
