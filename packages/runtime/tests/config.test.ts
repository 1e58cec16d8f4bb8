import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG } from "@capbridge/shared";
import { ConfigError, loadConfig } from "../src/config/load-config.js";
import { createLogger } from "../src/logger.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "capbridge-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const path = join(dir, "capbridge.config.json");
    await writeFile(path, typeof content === "string" ? content : JSON.stringify(content));
    return path;
  }

  it("falls back to defaults without a file", async () => {
    await expect(loadConfig(join(dir, "absent.json"), {})).resolves.toEqual(DEFAULT_CONFIG);
  });

  it("fills defaults around file values", async () => {
    const path = await writeConfig({ limits: { timeoutMs: 1000 }, http: { userAgent: "probe/1" } });
    const config = await loadConfig(path, {});

    expect(config.limits).toEqual({ timeoutMs: 1000, memMb: 256, stdoutBytes: 1048576 });
    expect(config.http.userAgent).toBe("probe/1");
    expect(config.http.maxRedirects).toBe(5);
  });

  it("lets the environment override the file", async () => {
    const path = await writeConfig({ limits: { timeoutMs: 1000 } });
    const config = await loadConfig(path, {
      CAPBRIDGE_TIMEOUT_MS: "2000",
      CAPBRIDGE_MAX_MEMORY_MB: "64",
      CAPBRIDGE_LOG_LEVEL: "debug",
      CAPBRIDGE_HTTP_PROXY: "http://proxy.test:3128",
    });

    expect(config.limits.timeoutMs).toBe(2000);
    expect(config.limits.memMb).toBe(64);
    expect(config.log.level).toBe("debug");
    expect(config.http.proxy).toBe("http://proxy.test:3128");
  });

  it("lists schema violations", async () => {
    const path = await writeConfig({ limits: { timeoutMs: -1 } });
    await expect(loadConfig(path, {})).rejects.toThrow("limits.timeoutMs: Number must be greater than 0");
  });

  it("rejects malformed JSON", async () => {
    const path = await writeConfig("{ nope");
    await expect(loadConfig(path, {})).rejects.toThrow(ConfigError);
  });

  it("rejects invalid environment values", async () => {
    const error = await loadConfig(join(dir, "absent.json"), { CAPBRIDGE_LOG_LEVEL: "loud" }).catch(
      (err: unknown) => err
    );
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.source : undefined).toBe("environment");
  });
});

describe("createLogger", () => {
  it("applies the configured level", () => {
    expect(createLogger({ level: "warn", pretty: false }).level).toBe("warn");
  });
});
