/**
 * Configuration loading
 *
 * Priority: environment > capbridge.config.json > schema defaults.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { BridgeConfigSchema, CONFIG_FILE_NAME, LogConfigSchema, errorMessage, type BridgeConfig } from "@capbridge/shared";

export class ConfigError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`Invalid configuration (${source}): ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const EnvSchema = z.object({
  CAPBRIDGE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  CAPBRIDGE_MAX_MEMORY_MB: z.coerce.number().int().positive().optional(),
  CAPBRIDGE_MAX_STDOUT_BYTES: z.coerce.number().int().positive().optional(),
  CAPBRIDGE_LOG_LEVEL: LogConfigSchema.shape.level.removeDefault().optional(),
  CAPBRIDGE_HTTP_PROXY: z.string().url().optional(),
});

export async function loadConfig(
  path: string = resolve(process.cwd(), CONFIG_FILE_NAME),
  env: NodeJS.ProcessEnv = process.env
): Promise<BridgeConfig> {
  let raw: unknown = {};
  if (existsSync(path)) {
    const text = await readFile(path, "utf-8");
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(path, [`invalid JSON: ${errorMessage(error)}`]);
    }
  }

  const config = validate(BridgeConfigSchema, raw, path);
  const overrides = validate(EnvSchema, env, "environment");

  if (overrides.CAPBRIDGE_TIMEOUT_MS !== undefined) {
    config.limits.timeoutMs = overrides.CAPBRIDGE_TIMEOUT_MS;
  }
  if (overrides.CAPBRIDGE_MAX_MEMORY_MB !== undefined) {
    config.limits.memMb = overrides.CAPBRIDGE_MAX_MEMORY_MB;
  }
  if (overrides.CAPBRIDGE_MAX_STDOUT_BYTES !== undefined) {
    config.limits.stdoutBytes = overrides.CAPBRIDGE_MAX_STDOUT_BYTES;
  }
  if (overrides.CAPBRIDGE_LOG_LEVEL !== undefined) {
    config.log.level = overrides.CAPBRIDGE_LOG_LEVEL;
  }
  if (overrides.CAPBRIDGE_HTTP_PROXY !== undefined) {
    config.http.proxy = overrides.CAPBRIDGE_HTTP_PROXY;
  }

  return config;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, source: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
