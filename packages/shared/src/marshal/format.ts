/**
 * Debug formatting of dynamic values. Diagnostic output only, never parsed back.
 */

import type { DynamicValue } from "../types/value.js";

export function formatValue(value: DynamicValue): string {
  switch (value.kind) {
    case "nil":
      return "null";
    case "boolean":
      return value.value ? "true" : "false";
    case "number":
      return String(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "bytes":
      return formatBytes(value.value);
    case "table": {
      const parts = value.entries.map(([key, entry]) => `${formatValue(key)}: ${formatValue(entry)}`);
      return `{${parts.join(", ")}}`;
    }
  }
}

/**
 * b"..." with printable ASCII kept and everything else escaped
 */
export function formatBytes(data: Uint8Array): string {
  let out = 'b"';
  for (const byte of data) {
    switch (byte) {
      case 0x22:
        out += '\\"';
        break;
      case 0x5c:
        out += "\\\\";
        break;
      case 0x0a:
        out += "\\n";
        break;
      case 0x0d:
        out += "\\r";
        break;
      case 0x09:
        out += "\\t";
        break;
      default:
        out += byte >= 0x20 && byte < 0x7f
          ? String.fromCharCode(byte)
          : `\\x${byte.toString(16).padStart(2, "0")}`;
    }
  }
  return `${out}"`;
}
