export { toNativeBytes, fromNativeBytes } from "./bytes.js";
export { formatValue, formatBytes } from "./format.js";
export { toPlain, fromPlain, toJson, fromJson, plainKey } from "./plain.js";
export type { PlainValue, ToPlainOptions } from "./plain.js";
