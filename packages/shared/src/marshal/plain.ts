/**
 * Conversions between dynamic values and plain JavaScript data (JSON-shaped,
 * with Uint8Array allowed for byte strings)
 */

import { MAX_VALUE_DEPTH } from "../constants.js";
import { ConversionError } from "../errors.js";
import { NIL, bool, isSequence, list, num, str, table, type DynamicValue, type TableEntry } from "../types/value.js";
import { fromNativeBytes } from "./bytes.js";
import { formatValue } from "./format.js";

export type PlainValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | PlainValue[]
  | { [key: string]: PlainValue };

export interface ToPlainOptions {
  /** "reject" turns byte strings into a ConversionError (JSON output) */
  bytes: "keep" | "reject";
}

export function toPlain(value: DynamicValue, options: ToPlainOptions = { bytes: "keep" }, depth = 0): PlainValue {
  if (depth > MAX_VALUE_DEPTH) {
    throw new ConversionError(`value nested deeper than ${MAX_VALUE_DEPTH} levels`);
  }

  switch (value.kind) {
    case "nil":
      return null;
    case "boolean":
    case "number":
    case "string":
      return value.value;
    case "bytes":
      if (options.bytes === "reject") {
        throw new ConversionError(`byte strings cannot be represented as JSON: ${formatValue(value)}`);
      }
      return Uint8Array.from(value.value);
    case "table": {
      if (isSequence(value)) {
        return value.entries.map(([, entry]) => toPlain(entry, options, depth + 1));
      }
      const out: { [key: string]: PlainValue } = {};
      for (const [key, entry] of value.entries) {
        out[plainKey(key)] = toPlain(entry, options, depth + 1);
      }
      return out;
    }
  }
}

export function plainKey(key: DynamicValue): string {
  if (key.kind === "string") return key.value;
  if (key.kind === "number") return String(key.value);
  throw new ConversionError(`unsupported table key: ${formatValue(key)}`);
}

export function fromPlain(input: unknown, depth = 0): DynamicValue {
  if (depth > MAX_VALUE_DEPTH) {
    throw new ConversionError(`value nested deeper than ${MAX_VALUE_DEPTH} levels`);
  }

  if (input === null || input === undefined) return NIL;
  if (typeof input === "boolean") return bool(input);
  if (typeof input === "number") return num(input);
  if (typeof input === "string") return str(input);
  if (input instanceof Uint8Array) return fromNativeBytes(input);
  if (Array.isArray(input)) {
    return list(input.map((element: unknown) => fromPlain(element, depth + 1)));
  }
  if (typeof input === "object") {
    const entries: TableEntry[] = Object.entries(input).map(
      ([key, element]: [string, unknown]) => [str(key), fromPlain(element, depth + 1)] as const
    );
    return table(entries);
  }
  throw new ConversionError(`unsupported value of type ${typeof input}`);
}

export function toJson(value: DynamicValue): string {
  return JSON.stringify(toPlain(value, { bytes: "reject" }));
}

/**
 * @throws SyntaxError on malformed JSON
 */
export function fromJson(text: string): DynamicValue {
  const parsed: unknown = JSON.parse(text);
  return fromPlain(parsed);
}
