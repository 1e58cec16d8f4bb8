/**
 * QuickJS runtime - runs one script against the capability catalog
 */

import { newAsyncContext } from "quickjs-emscripten";
import type { Logger } from "pino";
import {
  EXIT_CODES,
  ValueBridge,
  describeVmError,
  dumpResult,
  errorMessage,
  setupConsole,
  type LimitsConfig,
  type OutputSinks,
} from "@capbridge/shared";
import { ExecutionContext } from "../context/execution-context.js";
import type { CapabilityRegistry } from "../registry/capability-registry.js";
import type { HostServices } from "../services/index.js";

export interface RunResult {
  exitCode: number;
  lastValue?: string;
}

export interface ScriptRuntimeOptions {
  registry: CapabilityRegistry;
  services: HostServices;
  limits: LimitsConfig;
}

export class ScriptRuntime {
  private log: Logger;

  constructor(private options: ScriptRuntimeOptions) {
    this.log = options.services.logger.child({ component: "script-runtime" });
  }

  async execute(code: string, sinks: OutputSinks, filename = "script.js"): Promise<RunResult> {
    const { registry, services, limits } = this.options;
    const { timeoutMs, memMb } = limits;

    const vm = await newAsyncContext();
    const bridge = new ValueBridge(vm);
    const ctx = new ExecutionContext({
      transport: services.transport,
      http: services.http,
      logger: services.logger,
      output: sinks,
    });

    // Interrupt handler only fires while script code runs, not during host awaits
    const startTime = Date.now();
    let interrupted = false;
    vm.runtime.setInterruptHandler(() => {
      if (Date.now() - startTime > timeoutMs) {
        interrupted = true;
        return true;
      }
      return false;
    });
    vm.runtime.setMemoryLimit(memMb * 1024 * 1024);

    this.log.info({ contextId: ctx.id, filename }, "Script run started");
    let result: RunResult;
    try {
      setupConsole(vm, bridge, sinks);
      registry.install(vm, ctx, bridge);

      const evaluated = await vm.evalCodeAsync(code, filename);
      if (evaluated.error) {
        const error: unknown = vm.dump(evaluated.error);
        evaluated.error.dispose();
        result = { exitCode: this.report(describeVmError(error), interrupted, sinks) };
      } else {
        const lastValue = dumpResult(bridge, vm, evaluated.value);
        evaluated.value.dispose();
        result = { exitCode: EXIT_CODES.OK, lastValue };
      }
    } catch (error) {
      result = { exitCode: this.report(errorMessage(error), interrupted, sinks) };
    } finally {
      vm.runtime.setInterruptHandler(() => false);
      bridge.dispose();
      vm.dispose();
      await ctx.dispose();
    }

    this.log.info({ contextId: ctx.id, exitCode: result.exitCode, wallMs: Date.now() - startTime }, "Script run finished");
    return result;
  }

  private report(message: string, interrupted: boolean, sinks: OutputSinks): number {
    const { timeoutMs, memMb } = this.options.limits;

    if (interrupted) {
      sinks.onStderr(`Error: Execution timeout after ${timeoutMs}ms\n`);
      return EXIT_CODES.TIMEOUT;
    }
    if (/out of memory/i.test(message)) {
      sinks.onStderr(`Error: Memory limit exceeded (${memMb}MB limit)\n`);
      return EXIT_CODES.MEMORY_LIMIT;
    }
    sinks.onStderr(`${message}\n`);
    return EXIT_CODES.SCRIPT_ERROR;
  }
}
