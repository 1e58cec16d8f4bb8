/**
 * Relational store reachability probe, backed by mysql2
 */

import { createConnection } from "mysql2/promise";

export interface SqlTarget {
  host: string;
  port: number;
  user: string;
  password: string;
}

/**
 * Resolves once a connection was established and closed again; rejects
 * with the driver's error otherwise.
 */
export type SqlProbe = (target: SqlTarget) => Promise<void>;

export function createMysqlProbe(options: { connectTimeoutMs: number }): SqlProbe {
  return async (target) => {
    const connection = await createConnection({
      host: target.host,
      port: target.port,
      user: target.user,
      password: target.password,
      connectTimeout: options.connectTimeoutMs,
    });
    await connection.end();
  };
}
