/**
 * Dynamic value model - the values that cross the script/host boundary
 */

export interface NilValue {
  kind: "nil";
}

export interface BooleanValue {
  kind: "boolean";
  value: boolean;
}

export interface NumberValue {
  kind: "number";
  value: number; // always a double, integers included
}

export interface StringValue {
  kind: "string";
  value: string;
}

/**
 * Opaque byte string. Never assumed to hold valid text.
 */
export interface BytesValue {
  kind: "bytes";
  value: Uint8Array;
}

export type TableEntry = readonly [key: DynamicValue, value: DynamicValue];

/**
 * Ordered sequence of key/value pairs, used both as array and as map.
 */
export interface TableValue {
  kind: "table";
  entries: TableEntry[];
}

export type DynamicValue =
  | NilValue
  | BooleanValue
  | NumberValue
  | StringValue
  | BytesValue
  | TableValue;

export const NIL: NilValue = Object.freeze({ kind: "nil" });

export function bool(value: boolean): BooleanValue {
  return { kind: "boolean", value };
}

export function num(value: number): NumberValue {
  return { kind: "number", value };
}

export function str(value: string): StringValue {
  return { kind: "string", value };
}

export function bytes(value: Uint8Array | readonly number[]): BytesValue {
  return { kind: "bytes", value: Uint8Array.from(value) };
}

export function table(entries: TableEntry[]): TableValue {
  return { kind: "table", entries };
}

/**
 * Sequence table keyed 0..n-1
 */
export function list(values: readonly DynamicValue[]): TableValue {
  return table(values.map((value, index) => [num(index), value] as const));
}

/**
 * Map table keyed by strings, in insertion order
 */
export function record(fields: Record<string, DynamicValue>): TableValue {
  return table(Object.entries(fields).map(([key, value]) => [str(key), value] as const));
}

/**
 * True when the table's keys are exactly the numbers 0..n-1 in order.
 * Empty tables are not sequences.
 */
export function isSequence(value: TableValue): boolean {
  if (value.entries.length === 0) return false;
  return value.entries.every(([key], index) => key.kind === "number" && key.value === index);
}

/**
 * Look up a string key in a table
 */
export function tableGet(value: TableValue, key: string): DynamicValue | undefined {
  const entry = value.entries.find(([k]) => k.kind === "string" && k.value === key);
  return entry?.[1];
}
