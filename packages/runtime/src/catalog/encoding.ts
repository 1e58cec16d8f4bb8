/**
 * Hex and base64 encodings
 */

import { fromNativeBytes, str } from "@capbridge/shared";
import { defineCapability, type Capability } from "../registry/capability.js";
import { base64Decode, base64Encode, hexEncode } from "../services/encoding.js";

export function encodingCapabilities(): Capability[] {
  return [
    defineCapability({
      name: "hex",
      description: "Lower-case hex encoding of a byte sequence",
      params: [{ name: "data", shape: "bytes" }],
      parse: (args) => args.bytes(0),
      run: (_ctx, data) => str(hexEncode(data)),
    }),
    defineCapability({
      name: "base64_encode",
      description: "Standard padded base64 encoding of a byte sequence",
      params: [{ name: "data", shape: "bytes" }],
      parse: (args) => args.bytes(0),
      run: (_ctx, data) => str(base64Encode(data)),
    }),
    defineCapability({
      name: "base64_decode",
      description: "Decode standard padded base64 into bytes",
      params: [{ name: "text", shape: "string" }],
      parse: (args) => args.string(0),
      run: (_ctx, text) => fromNativeBytes(base64Decode(text)),
    }),
  ];
}
