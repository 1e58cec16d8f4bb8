/**
 * Capability definitions
 *
 * A capability parses its positional arguments up front (programmer errors
 * surface here) and returns a closure that performs the actual work. The
 * closure is the only place side effects happen.
 */

import {
  ArgumentError,
  ConversionError,
  NIL,
  formatValue,
  toNativeBytes,
  type DynamicValue,
} from "@capbridge/shared";
import type { ExecutionContext } from "../context/execution-context.js";
import type { SoftFailure } from "../context/error-channel.js";

export type ParamShape = "string" | "number" | "integer" | "boolean" | "bytes" | "value" | "string[]";

export interface ParamSpec {
  name: string;
  shape: ParamShape;
}

export type CapabilityResult = DynamicValue | SoftFailure;

interface DefinitionBase<A> {
  name: string;
  description: string;
  params: readonly ParamSpec[];
  /** returned to the script on operational failure, nil when omitted */
  failureValue?: DynamicValue;
  parse(args: ArgReader): A;
}

export interface SyncDefinition<A> extends DefinitionBase<A> {
  run(ctx: ExecutionContext, args: A): CapabilityResult;
}

export interface AsyncDefinition<A> extends DefinitionBase<A> {
  run(ctx: ExecutionContext, args: A): Promise<CapabilityResult>;
}

export interface CapabilityInfo {
  readonly name: string;
  readonly description: string;
  readonly params: readonly ParamSpec[];
  readonly failureValue: DynamicValue;
}

export interface SyncCapability extends CapabilityInfo {
  readonly mode: "sync";
  prepare(args: readonly DynamicValue[]): (ctx: ExecutionContext) => CapabilityResult;
}

export interface AsyncCapability extends CapabilityInfo {
  readonly mode: "async";
  prepare(args: readonly DynamicValue[]): (ctx: ExecutionContext) => Promise<CapabilityResult>;
}

export type Capability = SyncCapability | AsyncCapability;

export function defineCapability<A>(definition: SyncDefinition<A>): SyncCapability {
  return {
    mode: "sync",
    ...describe(definition),
    prepare(args) {
      const parsed = definition.parse(new ArgReader(definition.name, definition.params, args));
      return (ctx) => definition.run(ctx, parsed);
    },
  };
}

export function defineAsyncCapability<A>(definition: AsyncDefinition<A>): AsyncCapability {
  return {
    mode: "async",
    ...describe(definition),
    prepare(args) {
      const parsed = definition.parse(new ArgReader(definition.name, definition.params, args));
      return (ctx) => definition.run(ctx, parsed);
    },
  };
}

function describe<A>(definition: DefinitionBase<A>): CapabilityInfo {
  return {
    name: definition.name,
    description: definition.description,
    params: definition.params,
    failureValue: definition.failureValue ?? NIL,
  };
}

/**
 * Typed access to positional arguments. Every failure is an ArgumentError.
 */
export class ArgReader {
  constructor(
    private capability: string,
    private params: readonly ParamSpec[],
    private args: readonly DynamicValue[]
  ) {
    if (args.length !== params.length) {
      throw new ArgumentError(
        `${capability}: expected ${params.length} argument(s), got ${args.length}`
      );
    }
  }

  value(index: number): DynamicValue {
    const value = this.args[index];
    if (value === undefined) {
      throw new ArgumentError(`${this.capability}: missing argument ${index + 1}`);
    }
    return value;
  }

  string(index: number): string {
    const value = this.value(index);
    if (value.kind !== "string") throw this.mismatch(index, "string", value);
    return value.value;
  }

  number(index: number): number {
    const value = this.value(index);
    if (value.kind !== "number") throw this.mismatch(index, "number", value);
    return value.value;
  }

  integer(index: number): number {
    const value = this.value(index);
    if (value.kind !== "number" || !Number.isInteger(value.value)) {
      throw this.mismatch(index, "integer", value);
    }
    return value.value;
  }

  boolean(index: number): boolean {
    const value = this.value(index);
    if (value.kind !== "boolean") throw this.mismatch(index, "boolean", value);
    return value.value;
  }

  bytes(index: number): Uint8Array {
    try {
      return toNativeBytes(this.value(index));
    } catch (error) {
      if (error instanceof ConversionError) {
        throw new ArgumentError(`${this.label(index)}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Sequence of strings; any other element is rejected rather than skipped
   */
  strings(index: number): string[] {
    const value = this.value(index);
    if (value.kind !== "table") throw this.mismatch(index, "array of strings", value);

    return value.entries.map(([, element], position) => {
      if (element.kind !== "string") {
        throw new ArgumentError(
          `${this.label(index)}: element ${position + 1} expected string, got ${formatValue(element)}`
        );
      }
      return element.value;
    });
  }

  /**
   * Raise an argument error for a value that passed the shape check but not
   * the capability's own constraints
   */
  invalid(index: number, detail: string): ArgumentError {
    return new ArgumentError(`${this.label(index)}: ${detail}`);
  }

  private mismatch(index: number, expected: string, actual: DynamicValue): ArgumentError {
    return new ArgumentError(`${this.label(index)}: expected ${expected}, got ${formatValue(actual)}`);
  }

  private label(index: number): string {
    const param = this.params[index];
    const name = param ? ` (${param.name})` : "";
    return `${this.capability}: argument ${index + 1}${name}`;
  }
}
