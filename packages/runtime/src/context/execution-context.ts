/**
 * Execution context - the state one running script owns exclusively
 *
 * Each context gets its own error slot and session/request store; nothing
 * here is shared between contexts.
 */

import { nanoid } from "nanoid";
import type { Logger } from "pino";
import type { HttpConfig, OutputSinks } from "@capbridge/shared";
import type { HttpTransport } from "../services/http-transport.js";
import { SessionStore } from "../services/session-store.js";
import { ErrorChannel, type SoftFailure } from "./error-channel.js";

export interface ExecutionContextOptions {
  transport: HttpTransport;
  http: HttpConfig;
  logger: Logger;
  output?: OutputSinks;
}

const processOutput: OutputSinks = {
  onStdout: (chunk) => process.stdout.write(chunk),
  onStderr: (chunk) => process.stderr.write(chunk),
};

export class ExecutionContext {
  readonly id = nanoid();
  readonly errors = new ErrorChannel();
  readonly store: SessionStore;
  readonly log: Logger;
  readonly output: OutputSinks;
  private disposed = false;

  constructor(options: ExecutionContextOptions) {
    this.log = options.logger.child({ contextId: this.id });
    this.output = options.output ?? processOutput;
    this.store = new SessionStore(options.transport, options.http, this.log);
  }

  /**
   * Record an operational failure and signal it to the registry
   */
  fail(message: string): SoftFailure {
    return this.errors.set(message);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Release sessions and unsent requests. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.store.dispose();
  }
}
