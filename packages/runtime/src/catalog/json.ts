import { ERROR_CODES, fromJson, str, toJson, withContext } from "@capbridge/shared";
import { defineCapability, type Capability } from "../registry/capability.js";

export function jsonCapabilities(): Capability[] {
  return [
    defineCapability({
      name: "json_decode",
      description: "Parse JSON text into a value",
      params: [{ name: "text", shape: "string" }],
      parse: (args) => args.string(0),
      run: (_ctx, text) => {
        try {
          return fromJson(text);
        } catch (error) {
          throw withContext(ERROR_CODES.INVALID_JSON, "invalid json", error);
        }
      },
    }),
    defineCapability({
      name: "json_encode",
      description: "Serialise a value as JSON text",
      params: [{ name: "value", shape: "value" }],
      parse: (args) => args.value(0),
      run: (_ctx, value) => str(toJson(value)),
    }),
  ];
}
