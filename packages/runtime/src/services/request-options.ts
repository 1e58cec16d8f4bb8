/**
 * Option table accepted by http_request
 */

import { z } from "zod";
import {
  InvalidOptionsError,
  errorMessage,
  formatValue,
  tableGet,
  toJson,
  toPlain,
  type DynamicValue,
} from "@capbridge/shared";

const StringMap = z.record(z.string());

export const RequestOptionsSchema = z
  .object({
    headers: StringMap.optional(),
    query: StringMap.optional(),
    basic_auth: z.tuple([z.string(), z.string()]).optional(),
    body: z.union([z.string(), z.instanceof(Uint8Array)]).optional(),
    json: z.unknown().optional(),
    form: StringMap.optional(),
    timeout: z.number().int().positive().optional(), // milliseconds
    proxy: z.string().url().optional(),
    tls_verify: z.boolean().optional(),
    redirects: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine(
    (options) => [options.body, options.json, options.form].filter((v) => v !== undefined).length <= 1,
    { message: "only one of body, json and form may be set" }
  );

/**
 * Normalised options stored on a pending request
 */
export interface RequestOptions {
  headers: Array<[string, string]>;
  query: Array<[string, string]>;
  body?: string | Uint8Array;
  timeoutMs?: number;
  proxy?: string;
  tlsVerify?: boolean;
  maxRedirects?: number;
}

/**
 * Validate the script's option table. nil means "no options".
 * @throws InvalidOptionsError
 */
export function parseRequestOptions(value: DynamicValue): RequestOptions {
  if (value.kind === "nil") {
    return { headers: [], query: [] };
  }
  if (value.kind !== "table") {
    throw new InvalidOptionsError(`expected a table, got ${formatValue(value)}`);
  }

  let plain: unknown;
  try {
    plain = toPlain(value);
  } catch (error) {
    throw new InvalidOptionsError(errorMessage(error));
  }

  const parsed = RequestOptionsSchema.safeParse(plain);
  if (!parsed.success) {
    throw new InvalidOptionsError(formatIssues(parsed.error));
  }
  const raw = parsed.data;

  const headers: Array<[string, string]> = Object.entries(raw.headers ?? {});
  let body: string | Uint8Array | undefined = raw.body;

  if (raw.basic_auth) {
    const [user, password] = raw.basic_auth;
    const token = Buffer.from(`${user}:${password}`, "utf8").toString("base64");
    setDefaultHeader(headers, "authorization", `Basic ${token}`);
  }

  const json = tableGet(value, "json");
  if (json !== undefined) {
    try {
      body = toJson(json);
    } catch (error) {
      throw new InvalidOptionsError(`json: ${errorMessage(error)}`);
    }
    setDefaultHeader(headers, "content-type", "application/json");
  }

  if (raw.form) {
    body = new URLSearchParams(raw.form).toString();
    setDefaultHeader(headers, "content-type", "application/x-www-form-urlencoded");
  }

  return {
    headers,
    query: Object.entries(raw.query ?? {}),
    body,
    timeoutMs: raw.timeout,
    proxy: raw.proxy,
    tlsVerify: raw.tls_verify,
    maxRedirects: raw.redirects,
  };
}

function setDefaultHeader(headers: Array<[string, string]>, name: string, value: string): void {
  if (!headers.some(([key]) => key.toLowerCase() === name)) {
    headers.push([name, value]);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "options"}: ${issue.message}`)
    .join("; ");
}
