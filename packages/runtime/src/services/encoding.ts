/**
 * Binary-to-text encodings
 */

import { InvalidEncodingError } from "@capbridge/shared";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function hexEncode(data: Uint8Array): string {
  return Buffer.from(data).toString("hex");
}

export function base64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}

/**
 * Strict standard-alphabet, padded base64
 * @throws InvalidEncodingError on anything else
 */
export function base64Decode(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new InvalidEncodingError("invalid base64 input");
  }
  return new Uint8Array(Buffer.from(text, "base64"));
}
