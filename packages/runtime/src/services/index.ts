/**
 * Host services shared by every capability, constructed once at setup
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { BridgeConfig, HttpConfig } from "@capbridge/shared";
import { randomInRange } from "./crypto.js";
import { DirectoryService, createLdaptsConnector } from "./directory.js";
import { UndiciTransport, type HttpTransport } from "./http-transport.js";
import { spawnProcess, type ProcessRunner } from "./process-runner.js";
import { createMysqlProbe, type SqlProbe } from "./sql-probe.js";

export interface HostServices {
  logger: Logger;
  http: HttpConfig;
  transport: HttpTransport;
  directory: DirectoryService;
  sqlProbe: SqlProbe;
  runProcess: ProcessRunner;
  sleep: (ms: number) => Promise<void>;
  random: (min: number, max: number) => number;
}

export function createHostServices(
  config: BridgeConfig,
  logger: Logger,
  overrides: Partial<HostServices> = {}
): HostServices {
  return {
    logger,
    http: config.http,
    transport: overrides.transport ?? new UndiciTransport({ policy: config.http.policy, logger }),
    directory: overrides.directory ?? new DirectoryService(createLdaptsConnector({ timeoutMs: config.ldap.timeoutMs })),
    sqlProbe: overrides.sqlProbe ?? createMysqlProbe({ connectTimeoutMs: config.mysql.connectTimeoutMs }),
    runProcess: overrides.runProcess ?? spawnProcess,
    sleep: overrides.sleep ?? ((ms) => pause(ms)),
    random: overrides.random ?? randomInRange,
  };
}

/** largest delay a single Node timer holds without overflowing to 1 ms */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Wait for ms milliseconds, split into timer-sized chunks
 */
export async function pause(ms: number, wait: (ms: number) => Promise<unknown> = delay): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await wait(chunk);
    remaining -= chunk;
  } while (remaining > 0);
}
