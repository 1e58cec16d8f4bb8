/**
 * HTTP transport backed by undici
 *
 * One dispatcher per (session, proxy, TLS policy) is kept open until the
 * session is released. Redirects are followed manually so every hop is
 * checked against the network policy and the session's cookie jar. Once a
 * redirect leaves the original origin, credentials the caller set are no
 * longer sent.
 */

import { Agent, Headers, ProxyAgent, getSetCookies, request, type Dispatcher } from "undici";
import type { Logger } from "pino";
import { TransportError, type HttpMethod, type NetworkPolicy } from "@capbridge/shared";
import { NetworkPolicyEnforcer } from "../policy/network.js";
import type { CookieJar } from "./cookie-jar.js";
import type { RequestOptions } from "./request-options.js";

export interface HttpSession {
  id: string;
  createdAt: number;
  cookies: CookieJar;
  userAgent: string;
  timeoutMs: number;
  tlsVerify: boolean;
  proxy?: string;
  maxRedirects: number;
}

export interface OutgoingRequest {
  method: HttpMethod;
  url: URL;
  options: RequestOptions;
}

export interface HttpResponse {
  status: number;
  /**
   * Grouped by name in first-seen order; values of one name keep their order.
   * undici folds repeated names together, so interleaved names are not
   * reproduced as they arrived.
   */
  headers: Array<[string, string]>;
  body: Uint8Array;
  url: string;
}

export interface HttpTransport {
  send(session: HttpSession, outgoing: OutgoingRequest): Promise<HttpResponse>;
  release(session: HttpSession): Promise<void>;
}

export interface TransportProfile {
  proxy?: string;
  tlsVerify: boolean;
}

export type DispatcherFactory = (profile: TransportProfile) => Dispatcher;

export interface UndiciTransportOptions {
  policy?: NetworkPolicy;
  dispatcherFactory?: DispatcherFactory;
  logger?: Logger;
}

export function defaultDispatcher(profile: TransportProfile): Dispatcher {
  if (profile.proxy) {
    return new ProxyAgent({
      uri: profile.proxy,
      requestTls: { rejectUnauthorized: profile.tlsVerify },
    });
  }
  return new Agent({ connect: { rejectUnauthorized: profile.tlsVerify } });
}

export class UndiciTransport implements HttpTransport {
  private dispatchers = new Map<string, Map<string, Dispatcher>>();
  private enforcer?: NetworkPolicyEnforcer;
  private createDispatcher: DispatcherFactory;
  private log?: Logger;

  constructor(options: UndiciTransportOptions = {}) {
    this.enforcer = options.policy ? new NetworkPolicyEnforcer(options.policy) : undefined;
    this.createDispatcher = options.dispatcherFactory ?? defaultDispatcher;
    this.log = options.logger?.child({ component: "http-transport" });
  }

  async send(session: HttpSession, outgoing: OutgoingRequest): Promise<HttpResponse> {
    const { options } = outgoing;
    const dispatcher = this.dispatcherFor(session.id, {
      proxy: options.proxy ?? session.proxy,
      tlsVerify: options.tlsVerify ?? session.tlsVerify,
    });
    const timeout = options.timeoutMs ?? session.timeoutMs;
    const maxRedirects = options.maxRedirects ?? session.maxRedirects;

    let method = outgoing.method;
    let body = options.body;
    let url = withQuery(outgoing.url, options.query);
    const origin = url.origin;
    let redirectCount = 0;

    for (;;) {
      this.checkPolicy(url);
      this.log?.debug({ sessionId: session.id, method, url: url.toString() }, "Dispatching HTTP request");

      let response: Dispatcher.ResponseData;
      try {
        response = await request(url, {
          method,
          headers: this.buildHeaders(session, options, url, {
            hasBody: body !== undefined,
            crossOrigin: url.origin !== origin,
          }),
          body,
          dispatcher,
          headersTimeout: timeout,
          bodyTimeout: timeout,
        });
      } catch (error) {
        throw new TransportError("http request failed", error);
      }

      this.storeCookies(session, url, response.headers);
      const status = response.statusCode;

      if (isRedirect(status) && maxRedirects > 0) {
        await response.body.dump();

        const location = firstHeader(response.headers.location);
        if (!location) {
          throw new TransportError("http request failed: redirect without location header");
        }

        redirectCount++;
        if (redirectCount > maxRedirects) {
          throw new TransportError(`http request failed: too many redirects (max: ${maxRedirects})`);
        }

        url = new URL(location, url);
        if (status === 303 || ((status === 301 || status === 302) && method === "POST")) {
          method = "GET";
          body = undefined;
        }
        continue;
      }

      return {
        status,
        headers: flattenHeaders(response.headers),
        body: await this.readBody(response),
        url: url.toString(),
      };
    }
  }

  async release(session: HttpSession): Promise<void> {
    const bySession = this.dispatchers.get(session.id);
    if (!bySession) return;
    this.dispatchers.delete(session.id);

    const unique = new Set(bySession.values());
    await Promise.all([...unique].map((dispatcher) => dispatcher.close()));
  }

  private dispatcherFor(sessionId: string, profile: TransportProfile): Dispatcher {
    let bySession = this.dispatchers.get(sessionId);
    if (!bySession) {
      bySession = new Map();
      this.dispatchers.set(sessionId, bySession);
    }

    const key = `${profile.proxy ?? ""}|${profile.tlsVerify}`;
    let dispatcher = bySession.get(key);
    if (!dispatcher) {
      dispatcher = this.createDispatcher(profile);
      bySession.set(key, dispatcher);
    }
    return dispatcher;
  }

  private checkPolicy(url: URL): void {
    if (!this.enforcer) return;
    const decision = this.enforcer.canFetch(url);
    if (!decision.allowed) {
      throw new TransportError(`network policy violation: ${decision.reason ?? "denied"}`);
    }
  }

  private buildHeaders(
    session: HttpSession,
    options: RequestOptions,
    target: URL,
    { hasBody, crossOrigin }: { hasBody: boolean; crossOrigin: boolean }
  ): Record<string, string> {
    const headers: Record<string, string> = { "user-agent": session.userAgent };
    for (const [name, value] of options.headers) {
      const key = name.toLowerCase();
      if (crossOrigin && CREDENTIAL_HEADERS.has(key)) continue;
      headers[key] = value;
    }

    const jar = session.cookies.header(target);
    if (jar !== undefined && headers.cookie === undefined) {
      headers.cookie = jar;
    }
    if (!hasBody) {
      delete headers["content-type"];
    }
    return headers;
  }

  private storeCookies(session: HttpSession, origin: URL, raw: Dispatcher.ResponseData["headers"]): void {
    const values = allHeaders(raw["set-cookie"]);
    if (values.length === 0) return;

    const headers = new Headers();
    for (const value of values) {
      headers.append("set-cookie", value);
    }
    session.cookies.store(origin, getSetCookies(headers));
  }

  private async readBody(response: Dispatcher.ResponseData): Promise<Uint8Array> {
    const limit = this.enforcer?.maxBodyBytes;
    const declared = Number(firstHeader(response.headers["content-length"]) ?? NaN);
    if (limit !== undefined && Number.isFinite(declared) && declared > limit) {
      await response.body.dump();
      throw new TransportError(`http request failed: response too large (${declared} bytes, max: ${limit})`);
    }

    let data: Uint8Array;
    try {
      data = new Uint8Array(await response.body.arrayBuffer());
    } catch (error) {
      throw new TransportError("http request failed", error);
    }

    if (this.enforcer && !this.enforcer.validateResponseSize(data.byteLength)) {
      throw new TransportError(`http request failed: response too large (${data.byteLength} bytes, max: ${limit})`);
    }
    return data;
  }
}

const CREDENTIAL_HEADERS = new Set(["authorization", "cookie"]);

function isRedirect(status: number): boolean {
  return [301, 302, 303, 307, 308].includes(status);
}

function withQuery(url: URL, query: Array<[string, string]>): URL {
  const out = new URL(url);
  for (const [name, value] of query) {
    out.searchParams.append(name, value);
  }
  return out;
}

function allHeaders(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return allHeaders(value)[0];
}

export function flattenHeaders(raw: Dispatcher.ResponseData["headers"]): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  for (const [name, value] of Object.entries(raw)) {
    for (const single of allHeaders(value)) {
      out.push([name, single]);
    }
  }
  return out;
}
