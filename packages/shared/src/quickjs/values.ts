/**
 * Conversion between QuickJS handles and dynamic values
 *
 * Script side: null/undefined, booleans, numbers, strings, ArrayBuffer (and
 * typed-array views on input), arrays and plain objects. Anything else
 * (functions, symbols, bigints) fails with a ConversionError.
 */

import type { QuickJSContext, QuickJSHandle } from "quickjs-emscripten";
import { MAX_VALUE_DEPTH } from "../constants.js";
import { ConversionError } from "../errors.js";
import { fromNativeBytes } from "../marshal/bytes.js";
import { plainKey } from "../marshal/plain.js";
import { NIL, bool, isSequence, num, str, table, type DynamicValue, type TableEntry } from "../types/value.js";

const HELPERS_SOURCE = `({
  kind(v) {
    if (v === null || v === undefined) return "nil";
    if (v instanceof ArrayBuffer) return "bytes";
    if (ArrayBuffer.isView(v)) return "view";
    if (Array.isArray(v)) return "array";
    return typeof v;
  },
  buffer(v) {
    return v.buffer.slice(v.byteOffset, v.byteOffset + v.byteLength);
  },
  keys(v) {
    return Object.keys(v);
  },
})`;

type HelperName = "kind" | "buffer" | "keys";

export class ValueBridge {
	private helpers: QuickJSHandle;

	constructor(private vm: QuickJSContext) {
		this.helpers = vm.unwrapResult(vm.evalCode(HELPERS_SOURCE, "value-bridge.js"));
	}

	/**
	 * Read a script value. The handle stays owned by the caller.
	 */
	toDynamic(handle: QuickJSHandle, depth = 0): DynamicValue {
		if (depth > MAX_VALUE_DEPTH) {
			throw new ConversionError(`value nested deeper than ${MAX_VALUE_DEPTH} levels`);
		}

		const kind = this.kindOf(handle);
		switch (kind) {
			case "nil":
				return NIL;
			case "boolean":
				return bool(this.vm.dump(handle) === true);
			case "number":
				return num(this.vm.getNumber(handle));
			case "string":
				return str(this.vm.getString(handle));
			case "bytes": {
				const lifetime = this.vm.getArrayBuffer(handle);
				try {
					return fromNativeBytes(lifetime.value);
				} finally {
					lifetime.dispose();
				}
			}
			case "view": {
				const buffer = this.callHelper("buffer", handle);
				try {
					return this.toDynamic(buffer, depth);
				} finally {
					buffer.dispose();
				}
			}
			case "array":
				return this.readArray(handle, depth);
			case "object":
				return this.readObject(handle, depth);
			default:
				throw new ConversionError(`unsupported script value of type ${kind}`);
		}
	}

	/**
	 * Create a script value. The returned handle is owned by the caller.
	 */
	fromDynamic(value: DynamicValue, depth = 0): QuickJSHandle {
		if (depth > MAX_VALUE_DEPTH) {
			throw new ConversionError(`value nested deeper than ${MAX_VALUE_DEPTH} levels`);
		}

		switch (value.kind) {
			case "nil":
				return this.vm.null;
			case "boolean":
				return value.value ? this.vm.true : this.vm.false;
			case "number":
				return this.vm.newNumber(value.value);
			case "string":
				return this.vm.newString(value.value);
			case "bytes":
				return this.vm.newArrayBuffer(Uint8Array.from(value.value).buffer);
			case "table": {
				const sequence = isSequence(value);
				const target = sequence ? this.vm.newArray() : this.vm.newObject();
				try {
					value.entries.forEach(([key, entry], index) => {
						const child = this.fromDynamic(entry, depth + 1);
						if (sequence) {
							this.vm.setProp(target, index, child);
						} else {
							this.vm.setProp(target, plainKey(key), child);
						}
						child.dispose();
					});
				} catch (error) {
					target.dispose();
					throw error;
				}
				return target;
			}
		}
	}

	dispose(): void {
		this.helpers.dispose();
	}

	private readArray(handle: QuickJSHandle, depth: number): DynamicValue {
		const length = this.lengthOf(handle);
		const entries: TableEntry[] = [];
		for (let index = 0; index < length; index++) {
			const element = this.vm.getProp(handle, index);
			try {
				entries.push([num(index), this.toDynamic(element, depth + 1)]);
			} finally {
				element.dispose();
			}
		}
		return table(entries);
	}

	private readObject(handle: QuickJSHandle, depth: number): DynamicValue {
		const keys = this.callHelper("keys", handle);
		try {
			const length = this.lengthOf(keys);
			const entries: TableEntry[] = [];
			for (let index = 0; index < length; index++) {
				const keyHandle = this.vm.getProp(keys, index);
				const key = this.vm.getString(keyHandle);
				keyHandle.dispose();

				const element = this.vm.getProp(handle, key);
				try {
					entries.push([str(key), this.toDynamic(element, depth + 1)]);
				} finally {
					element.dispose();
				}
			}
			return table(entries);
		} finally {
			keys.dispose();
		}
	}

	private kindOf(handle: QuickJSHandle): string {
		const result = this.callHelper("kind", handle);
		try {
			return this.vm.getString(result);
		} finally {
			result.dispose();
		}
	}

	private lengthOf(handle: QuickJSHandle): number {
		const length = this.vm.getProp(handle, "length");
		try {
			return this.vm.getNumber(length);
		} finally {
			length.dispose();
		}
	}

	private callHelper(name: HelperName, arg: QuickJSHandle): QuickJSHandle {
		const fn = this.vm.getProp(this.helpers, name);
		try {
			return this.vm.unwrapResult(this.vm.callFunction(fn, this.helpers, arg));
		} finally {
			fn.dispose();
		}
	}
}
