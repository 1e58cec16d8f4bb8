/**
 * Script executor - runs script files and captures their output
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { LimitsConfig } from "@capbridge/shared";
import type { ScriptRuntime } from "./quickjs-runtime.js";

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  wallMs: number;
  /** last expression value in debug form */
  lastValue?: string;
  /** output beyond the configured limit was dropped */
  truncated: boolean;
}

export class ScriptExecutor {
  constructor(
    private runtime: ScriptRuntime,
    private limits: LimitsConfig
  ) {}

  async executeFile(path: string): Promise<ExecutionResult> {
    const code = await readFile(path, "utf-8");
    return this.executeSource(code, basename(path));
  }

  async executeSource(code: string, filename = "script.js"): Promise<ExecutionResult> {
    const startTime = Date.now();
    const stdout = new CappedBuffer(this.limits.stdoutBytes);
    // stderr may grow a little past stdout so error messages survive
    const stderr = new CappedBuffer(this.limits.stdoutBytes * 2);

    const result = await this.runtime.execute(
      code,
      {
        onStdout: (chunk) => stdout.append(chunk),
        onStderr: (chunk) => stderr.append(chunk),
      },
      filename
    );

    return {
      exitCode: result.exitCode,
      stdout: stdout.text,
      stderr: stderr.text,
      wallMs: Date.now() - startTime,
      lastValue: result.lastValue,
      truncated: stdout.truncated || stderr.truncated,
    };
  }
}

class CappedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private limit: number) {}

  append(chunk: string): void {
    if (this.truncated) return;

    const data = Buffer.from(chunk, "utf8");
    const room = this.limit - this.size;
    if (data.byteLength > room) {
      this.chunks.push(data.subarray(0, room));
      this.size = this.limit;
      this.truncated = true;
      return;
    }
    this.chunks.push(data);
    this.size += data.byteLength;
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
