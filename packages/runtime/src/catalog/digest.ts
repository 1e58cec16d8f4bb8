/**
 * Digest family: bytes in, opaque bytes out
 */

import { fromNativeBytes } from "@capbridge/shared";
import { defineCapability, type Capability } from "../registry/capability.js";
import { DIGESTS, digest, type DigestName } from "../services/crypto.js";

function digestCapability(name: DigestName): Capability {
  return defineCapability({
    name,
    description: `${name} digest of a byte sequence`,
    params: [{ name: "data", shape: "bytes" }],
    parse: (args) => args.bytes(0),
    run: (_ctx, data) => fromNativeBytes(digest(name, data)),
  });
}

export function digestCapabilities(): Capability[] {
  return Object.keys(DIGESTS)
    .filter((name): name is DigestName => name in DIGESTS)
    .map(digestCapability);
}
