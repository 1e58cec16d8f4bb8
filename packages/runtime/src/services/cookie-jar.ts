/**
 * Per-session cookie jar (RFC 6265 section 5 subset)
 *
 * Cookies are scoped by domain and path. A cookie without a Domain attribute
 * is host-only and goes back to the exact host that set it.
 */

import type { Cookie } from "undici";

interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  hostOnly: boolean;
  path: string;
  /** ms epoch, Infinity for a session cookie */
  expires: number;
  secure: boolean;
}

export class CookieJar {
  private cookies: StoredCookie[] = [];

  constructor(private now: () => number = Date.now) {}

  get size(): number {
    return this.live().length;
  }

  /**
   * Record cookies from a response to origin. A Domain attribute that does
   * not cover the origin host makes the cookie ignored.
   */
  store(origin: URL, cookies: readonly Cookie[]): void {
    const host = origin.hostname.toLowerCase();

    for (const cookie of cookies) {
      const requested = cookie.domain?.replace(/^\./, "").toLowerCase();
      if (requested && !domainMatches(host, requested)) continue;

      const entry: StoredCookie = {
        name: cookie.name,
        value: cookie.value,
        domain: requested || host,
        hostOnly: !requested,
        path: cookie.path?.startsWith("/") ? cookie.path : defaultPath(origin),
        expires: this.expiry(cookie),
        secure: cookie.secure ?? false,
      };

      this.cookies = this.cookies.filter(
        (c) => !(c.name === entry.name && c.domain === entry.domain && c.path === entry.path)
      );
      if (entry.expires > this.now()) {
        this.cookies.push(entry);
      }
    }
  }

  /**
   * Cookie header value for a request to target, undefined when nothing applies
   */
  header(target: URL): string | undefined {
    const host = target.hostname.toLowerCase();
    const secure = target.protocol === "https:";

    const matching = this.live().filter(
      (c) =>
        (c.hostOnly ? host === c.domain : domainMatches(host, c.domain)) &&
        pathMatches(target.pathname, c.path) &&
        (secure || !c.secure)
    );
    if (matching.length === 0) return undefined;
    return matching.map((c) => `${c.name}=${c.value}`).join("; ");
  }

  private live(): StoredCookie[] {
    const now = this.now();
    this.cookies = this.cookies.filter((c) => c.expires > now);
    return this.cookies;
  }

  private expiry(cookie: Cookie): number {
    if (cookie.maxAge !== undefined) {
      return cookie.maxAge <= 0 ? 0 : this.now() + cookie.maxAge * 1000;
    }
    if (cookie.expires !== undefined) {
      return cookie.expires instanceof Date ? cookie.expires.getTime() : cookie.expires;
    }
    return Infinity;
  }
}

function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith("/") || requestPath[cookiePath.length] === "/";
}

/** directory of the request path, "/" at the top */
function defaultPath(origin: URL): string {
  const path = origin.pathname;
  const slash = path.lastIndexOf("/");
  return slash <= 0 ? "/" : path.slice(0, slash);
}
