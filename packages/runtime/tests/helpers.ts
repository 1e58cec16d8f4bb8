/**
 * Shared fixtures for runtime tests: silent logger, captured output and
 * in-process stand-ins for the network-facing services
 */

import pino from "pino";
import { DEFAULT_CONFIG, type OutputSinks } from "@capbridge/shared";
import { ExecutionContext } from "../src/context/execution-context.js";
import type { DirectoryConnection } from "../src/services/directory.js";
import type { HttpResponse, HttpSession, HttpTransport, OutgoingRequest } from "../src/services/http-transport.js";
import { createHostServices, type HostServices } from "../src/services/index.js";

export const silentLogger = pino({ level: "silent" });

export interface CapturedOutput extends OutputSinks {
  stdout: string[];
  stderr: string[];
}

export function captureOutput(): CapturedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    onStdout: (chunk) => stdout.push(chunk),
    onStderr: (chunk) => stderr.push(chunk),
  };
}

export function testServices(overrides: Partial<HostServices> = {}): HostServices {
  return createHostServices(DEFAULT_CONFIG, silentLogger, overrides);
}

export function testContext(services: HostServices, output: OutputSinks = captureOutput()): ExecutionContext {
  return new ExecutionContext({
    transport: services.transport,
    http: services.http,
    logger: services.logger,
    output,
  });
}

/**
 * Transport that answers every request with an empty 200 and records traffic
 */
export class RecordingTransport implements HttpTransport {
  sent: OutgoingRequest[] = [];
  released: string[] = [];

  async send(_session: HttpSession, outgoing: OutgoingRequest): Promise<HttpResponse> {
    this.sent.push(outgoing);
    return { status: 200, headers: [], body: new Uint8Array(), url: outgoing.url.toString() };
  }

  async release(session: HttpSession): Promise<void> {
    this.released.push(session.id);
  }
}

export interface FakeDirectoryOptions {
  /** dn -> password */
  accounts?: Record<string, string>;
  /** uid -> matching DNs */
  entries?: Record<string, string[]>;
  /** bind rejects with this error instead of answering */
  bindError?: Error;
}

/**
 * In-memory directory connection that records binds
 */
export class FakeDirectoryConnection implements DirectoryConnection {
  binds: Array<[string, string]> = [];
  searches: Array<[string, string, string]> = [];
  closed = false;

  constructor(private options: FakeDirectoryOptions = {}) {}

  async bind(dn: string, password: string): Promise<boolean> {
    this.binds.push([dn, password]);
    if (this.options.bindError) {
      throw this.options.bindError;
    }
    return this.options.accounts?.[dn] === password;
  }

  async search(baseDn: string, attribute: string, value: string): Promise<string[]> {
    this.searches.push([baseDn, attribute, value]);
    return this.options.entries?.[value] ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
