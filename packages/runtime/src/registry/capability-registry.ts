/**
 * Capability registry - binds names in the script global namespace to host
 * capabilities and routes their failures
 *
 * Programmer errors (unknown name, wrong arity, unconvertible argument) are
 * raised into the script as TypeErrors. Everything that fails inside a
 * capability is written to the context's error channel and the capability's
 * failure value is returned instead.
 */

import type { QuickJSAsyncContext, QuickJSHandle } from "quickjs-emscripten";
import type { Logger } from "pino";
import {
  ArgumentError,
  ConversionError,
  errorMessage,
  type DynamicValue,
  type ValueBridge,
} from "@capbridge/shared";
import type { ExecutionContext } from "../context/execution-context.js";
import { isSoftFailure } from "../context/error-channel.js";
import type { Capability, CapabilityInfo, CapabilityResult } from "./capability.js";

export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: "capability-registry" });
  }

  register(capability: Capability): this {
    if (this.capabilities.has(capability.name)) {
      throw new Error(`Capability already registered: ${capability.name}`);
    }
    this.capabilities.set(capability.name, capability);
    return this;
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  get(name: string): CapabilityInfo | undefined {
    return this.capabilities.get(name);
  }

  names(): string[] {
    return [...this.capabilities.keys()].sort();
  }

  /**
   * Invoke a capability from the host side
   * @throws ArgumentError on programmer errors
   */
  async invoke(ctx: ExecutionContext, name: string, args: readonly DynamicValue[]): Promise<DynamicValue> {
    const capability = this.lookup(name);
    const run = capability.prepare(args);
    return this.completeAsync(capability, ctx, async () => run(ctx));
  }

  /**
   * Invoke a synchronous capability without yielding
   */
  invokeSync(ctx: ExecutionContext, name: string, args: readonly DynamicValue[]): DynamicValue {
    const capability = this.lookup(name);
    if (capability.mode !== "sync") {
      throw new ArgumentError(`${name}: capability is asynchronous`);
    }
    const run = capability.prepare(args);
    return this.complete(capability, ctx, () => run(ctx));
  }

  /**
   * Define every capability as a global function in the VM. I/O capabilities
   * are asyncified, so scripts see them as blocking calls.
   */
  install(vm: QuickJSAsyncContext, ctx: ExecutionContext, bridge: ValueBridge): void {
    for (const capability of this.capabilities.values()) {
      const handle = capability.mode === "sync"
        ? vm.newFunction(capability.name, (...args: QuickJSHandle[]) => {
            try {
              const run = capability.prepare(this.readArgs(bridge, capability.name, args));
              return bridge.fromDynamic(this.complete(capability, ctx, () => run(ctx)));
            } catch (error) {
              return this.scriptError(vm, error);
            }
          })
        : vm.newAsyncifiedFunction(capability.name, async (...args: QuickJSHandle[]) => {
            try {
              // arguments are read before the first await
              const run = capability.prepare(this.readArgs(bridge, capability.name, args));
              return bridge.fromDynamic(await this.completeAsync(capability, ctx, () => run(ctx)));
            } catch (error) {
              return this.scriptError(vm, error);
            }
          });

      vm.setProp(vm.global, capability.name, handle);
      handle.dispose();
    }
    this.log.debug({ contextId: ctx.id, count: this.capabilities.size }, "Capabilities installed");
  }

  private complete(capability: Capability, ctx: ExecutionContext, run: () => CapabilityResult): DynamicValue {
    try {
      return this.settle(capability, run());
    } catch (error) {
      return this.recover(capability, ctx, error);
    }
  }

  private async completeAsync(
    capability: Capability,
    ctx: ExecutionContext,
    run: () => Promise<CapabilityResult>
  ): Promise<DynamicValue> {
    try {
      return this.settle(capability, await run());
    } catch (error) {
      return this.recover(capability, ctx, error);
    }
  }

  private readArgs(bridge: ValueBridge, name: string, handles: QuickJSHandle[]): DynamicValue[] {
    return handles.map((handle, index) => {
      try {
        return bridge.toDynamic(handle);
      } catch (error) {
        if (error instanceof ConversionError) {
          throw new ArgumentError(`${name}: argument ${index + 1}: ${error.message}`, { cause: error });
        }
        throw error;
      }
    });
  }

  private lookup(name: string): Capability {
    const capability = this.capabilities.get(name);
    if (!capability) {
      throw new ArgumentError(`unknown capability: ${name}`);
    }
    return capability;
  }

  private settle(capability: Capability, result: CapabilityResult): DynamicValue {
    return isSoftFailure(result) ? capability.failureValue : result;
  }

  private recover(capability: Capability, ctx: ExecutionContext, error: unknown): DynamicValue {
    if (error instanceof ArgumentError) {
      throw error;
    }
    ctx.log.debug({ capability: capability.name, err: error }, "Capability failed");
    return this.settle(capability, ctx.errors.set(errorMessage(error)));
  }

  private scriptError(vm: QuickJSAsyncContext, error: unknown): { error: QuickJSHandle } {
    return {
      error: vm.newError({
        name: error instanceof ArgumentError ? "TypeError" : "Error",
        message: errorMessage(error),
      }),
    };
  }
}
