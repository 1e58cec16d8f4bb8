/**
 * Byte marshalling between dynamic values and native byte sequences
 */

import { ConversionError } from "../errors.js";
import type { BytesValue, DynamicValue } from "../types/value.js";
import { formatValue } from "./format.js";

const encoder = new TextEncoder();

/**
 * Accepts byte strings, text (UTF-8 encoded) and tables of integers in [0, 255].
 * @throws ConversionError naming the offending value
 */
export function toNativeBytes(value: DynamicValue): Uint8Array {
  switch (value.kind) {
    case "bytes":
      return Uint8Array.from(value.value);
    case "string":
      return encoder.encode(value.value);
    case "table": {
      const out = new Uint8Array(value.entries.length);
      value.entries.forEach(([, element], index) => {
        out[index] = toByte(element);
      });
      return out;
    }
    default:
      throw new ConversionError(`invalid type: ${formatValue(value)}`);
  }
}

function toByte(element: DynamicValue): number {
  if (element.kind !== "number") {
    throw new ConversionError(`unexpected type: ${formatValue(element)}`);
  }
  const n = element.value;
  if (!Number.isInteger(n) || n < 0 || n > 255) {
    throw new ConversionError(`number is out of range: ${formatValue(element)}`);
  }
  return n;
}

/**
 * Always yields the opaque byte string variant, never decoded text.
 */
export function fromNativeBytes(data: Uint8Array): BytesValue {
  return { kind: "bytes", value: Uint8Array.from(data) };
}
