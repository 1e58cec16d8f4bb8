import { CapabilityRegistry } from "../registry/capability-registry.js";
import type { HostServices } from "../services/index.js";
import { digestCapabilities } from "./digest.js";
import { encodingCapabilities } from "./encoding.js";
import { htmlCapabilities } from "./html.js";
import { httpCapabilities } from "./http.js";
import { jsonCapabilities } from "./json.js";
import { ldapCapabilities } from "./ldap.js";
import { systemCapabilities } from "./system.js";

/**
 * Registry holding every script-visible capability
 */
export function createCatalog(services: HostServices): CapabilityRegistry {
  const registry = new CapabilityRegistry(services.logger);
  const capabilities = [
    ...digestCapabilities(),
    ...encodingCapabilities(),
    ...jsonCapabilities(),
    ...htmlCapabilities(),
    ...httpCapabilities(services),
    ...ldapCapabilities(services),
    ...systemCapabilities(services),
  ];
  for (const capability of capabilities) {
    registry.register(capability);
  }
  return registry;
}

export { responseValue } from "./http.js";
