import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, type LimitsConfig } from "@capbridge/shared";
import { createCatalog } from "../src/catalog/index.js";
import { ScriptExecutor } from "../src/harness/executor.js";
import { ScriptRuntime } from "../src/harness/quickjs-runtime.js";
import { testServices } from "./helpers.js";

function createExecutor(limits: Partial<LimitsConfig> = {}): ScriptExecutor {
  const services = testServices();
  const merged = { ...DEFAULT_CONFIG.limits, ...limits };
  const runtime = new ScriptRuntime({ registry: createCatalog(services), services, limits: merged });
  return new ScriptExecutor(runtime, merged);
}

describe("ScriptExecutor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "capbridge-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs a script file and captures its output", async () => {
    const path = join(dir, "hello.js");
    await writeFile(path, 'console.log("hello"); json_encode({ n: 1 })');

    const result = await createExecutor().executeFile(path);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("hello\n");
    expect(result.stderr).toBe("");
    expect(result.lastValue).toBe('"{\\"n\\":1}"');
    expect(result.truncated).toBe(false);
  });

  it("drops output beyond the stdout limit", async () => {
    const result = await createExecutor({ stdoutBytes: 5 }).executeSource('console.log("hello world")');

    expect(result.stdout).toBe("hello");
    expect(result.truncated).toBe(true);
  });

  it("rejects missing files", async () => {
    await expect(createExecutor().executeFile(join(dir, "missing.js"))).rejects.toThrow(/ENOENT/);
  });
});
