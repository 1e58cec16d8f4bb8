/**
 * Session/request store - HTTP sessions and built-but-unsent requests,
 * addressed by opaque tokens and owned by one execution context
 */

import { nanoid } from "nanoid";
import type { Logger } from "pino";
import {
  HTTP_METHODS,
  InvalidOptionsError,
  UnknownRequestError,
  UnknownSessionError,
  type DynamicValue,
  type HttpConfig,
  type HttpMethod,
} from "@capbridge/shared";
import { CookieJar } from "./cookie-jar.js";
import type { HttpResponse, HttpSession, HttpTransport } from "./http-transport.js";
import { parseRequestOptions, type RequestOptions } from "./request-options.js";

export interface PendingRequest {
  id: string;
  sessionId: string;
  method: HttpMethod;
  url: URL;
  options: RequestOptions;
  createdAt: number;
}

export class SessionStore {
  private sessions = new Map<string, HttpSession>();
  private pending = new Map<string, PendingRequest>();

  constructor(
    private transport: HttpTransport,
    private defaults: HttpConfig,
    private log: Logger
  ) {}

  /**
   * Allocate a session with the default transport configuration
   */
  openSession(): string {
    const session = newSession(this.defaults);
    this.sessions.set(session.id, session);
    this.log.debug({ sessionId: session.id }, "HTTP session opened");
    return session.id;
  }

  /**
   * Validate and store a request without sending it
   * @throws UnknownSessionError, InvalidOptionsError
   */
  buildRequest(sessionId: string, method: string, url: string, options: DynamicValue): string {
    if (!this.sessions.has(sessionId)) {
      throw new UnknownSessionError(sessionId);
    }

    const normalizedMethod = method.toUpperCase();
    if (!isHttpMethod(normalizedMethod)) {
      throw new InvalidOptionsError(`unsupported method: ${method}`);
    }

    const pending: PendingRequest = {
      id: nanoid(),
      sessionId,
      method: normalizedMethod,
      url: parseHttpUrl(url),
      options: parseRequestOptions(options),
      createdAt: Date.now(),
    };
    this.pending.set(pending.id, pending);

    this.log.debug({ sessionId, requestId: pending.id, method: pending.method, url }, "HTTP request built");
    return pending.id;
  }

  /**
   * Consume a pending request and dispatch it. A token can be sent once.
   * @throws UnknownRequestError, UnknownSessionError, TransportError
   */
  async sendRequest(requestId: string): Promise<HttpResponse> {
    const pending = this.pending.get(requestId);
    if (!pending) {
      throw new UnknownRequestError(requestId);
    }
    this.pending.delete(requestId);

    const session = this.sessions.get(pending.sessionId);
    if (!session) {
      throw new UnknownSessionError(pending.sessionId);
    }

    const response = await this.transport.send(session, pending);
    this.log.debug({ requestId, status: response.status }, "HTTP request sent");
    return response;
  }

  /**
   * Inspect a pending request without consuming it
   */
  peekRequest(requestId: string): Readonly<PendingRequest> | undefined {
    return this.pending.get(requestId);
  }

  getSession(sessionId: string): Readonly<HttpSession> | undefined {
    return this.sessions.get(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Release every session and drop unsent requests
   */
  async dispose(): Promise<void> {
    if (this.pending.size > 0) {
      this.log.debug({ count: this.pending.size }, "Dropping unsent HTTP requests");
    }
    this.pending.clear();

    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => this.transport.release(session)));
  }
}

/**
 * Fresh session state with the configured transport defaults
 */
export function newSession(defaults: HttpConfig): HttpSession {
  return {
    id: nanoid(),
    createdAt: Date.now(),
    cookies: new CookieJar(),
    userAgent: defaults.userAgent,
    timeoutMs: defaults.timeoutMs,
    tlsVerify: defaults.tlsVerify,
    proxy: defaults.proxy,
    maxRedirects: defaults.maxRedirects,
  };
}

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((known) => known === method);
}

export function parseHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidOptionsError(`invalid url: ${url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidOptionsError(`unsupported url scheme: ${parsed.protocol}`);
  }
  return parsed;
}
