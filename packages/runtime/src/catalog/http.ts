/**
 * HTTP capabilities: one-shot basic-auth probe and the session/request API
 */

import { bool, bytes, list, num, record, str, type DynamicValue } from "@capbridge/shared";
import { defineAsyncCapability, defineCapability, type Capability } from "../registry/capability.js";
import type { HostServices } from "../services/index.js";
import type { HttpResponse } from "../services/http-transport.js";
import { parseRequestOptions } from "../services/request-options.js";
import { newSession, parseHttpUrl } from "../services/session-store.js";

export function responseValue(response: HttpResponse): DynamicValue {
  return record({
    status: num(response.status),
    headers: list(response.headers.map(([name, value]) => list([str(name), str(value)]))),
    body: bytes(response.body),
    url: str(response.url),
  });
}

export function httpCapabilities(services: HostServices): Capability[] {
  return [
    defineAsyncCapability({
      name: "http_basic_auth",
      description: "GET a URL with basic credentials and report whether they were accepted",
      params: [
        { name: "url", shape: "string" },
        { name: "user", shape: "string" },
        { name: "password", shape: "string" },
      ],
      failureValue: bool(false),
      parse: (args) => ({ url: args.string(0), user: args.string(1), password: args.string(2) }),
      run: async (_ctx, { url, user, password }) => {
        const session = newSession(services.http);
        const options = parseRequestOptions(record({ basic_auth: list([str(user), str(password)]) }));
        try {
          const response = await services.transport.send(session, {
            method: "GET",
            url: parseHttpUrl(url),
            options,
          });
          const challenged = response.headers.some(([name]) => name.toLowerCase() === "www-authenticate");
          return bool(response.status !== 401 && !challenged);
        } finally {
          await services.transport.release(session);
        }
      },
    }),

    defineCapability({
      name: "http_mksession",
      description: "Open an HTTP session with its own cookie jar",
      params: [],
      parse: () => undefined,
      run: (ctx) => str(ctx.store.openSession()),
    }),

    defineCapability({
      name: "http_request",
      description: "Prepare a request on a session; returns a request token",
      params: [
        { name: "session", shape: "string" },
        { name: "method", shape: "string" },
        { name: "url", shape: "string" },
        { name: "options", shape: "value" },
      ],
      parse: (args) => ({
        session: args.string(0),
        method: args.string(1),
        url: args.string(2),
        options: args.value(3),
      }),
      run: (ctx, { session, method, url, options }) =>
        str(ctx.store.buildRequest(session, method, url, options)),
    }),

    defineAsyncCapability({
      name: "http_send",
      description: "Send a prepared request; a token can be sent once",
      params: [{ name: "request", shape: "string" }],
      parse: (args) => args.string(0),
      run: async (ctx, requestId) => responseValue(await ctx.store.sendRequest(requestId)),
    }),
  ];
}

