/**
 * Configuration types - capbridge.config.json
 */

import { z } from "zod";

export const NetworkPolicySchema = z.object({
  allowedDomains: z.array(z.string()).default(["*"]),
  deniedDomains: z.array(z.string()).default([]),
  denyIpLiterals: z.boolean().default(false),
  maxBodyBytes: z.number().int().positive().default(5 * 1024 * 1024), // 5MB
});

export const LimitsSchema = z.object({
  timeoutMs: z.number().int().positive().default(60000), // 60s
  memMb: z.number().int().positive().default(256),
  stdoutBytes: z.number().int().positive().default(1024 * 1024), // 1MB
});

export const HttpConfigSchema = z.object({
  userAgent: z.string().default("capbridge/0.1"),
  timeoutMs: z.number().int().positive().default(30000),
  tlsVerify: z.boolean().default(true),
  proxy: z.string().url().optional(),
  maxRedirects: z.number().int().nonnegative().default(5),
  policy: NetworkPolicySchema.optional(),
});

export const LdapConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10000),
});

export const MysqlConfigSchema = z.object({
  connectTimeoutMs: z.number().int().positive().default(10000),
});

export const LogConfigSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  pretty: z.boolean().default(false),
});

export const BridgeConfigSchema = z.object({
  limits: LimitsSchema.default({}),
  http: HttpConfigSchema.default({}),
  ldap: LdapConfigSchema.default({}),
  mysql: MysqlConfigSchema.default({}),
  log: LogConfigSchema.default({}),
});

export type NetworkPolicy = z.infer<typeof NetworkPolicySchema>;
export type LimitsConfig = z.infer<typeof LimitsSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type LdapConfig = z.infer<typeof LdapConfigSchema>;
export type MysqlConfig = z.infer<typeof MysqlConfigSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export const DEFAULT_CONFIG: BridgeConfig = BridgeConfigSchema.parse({});
