/**
 * Directory service capabilities
 */

import { bool, str } from "@capbridge/shared";
import { defineAsyncCapability, defineCapability, type Capability } from "../registry/capability.js";
import { escapeDnValue } from "../services/directory.js";
import type { HostServices } from "../services/index.js";

export function ldapCapabilities(services: HostServices): Capability[] {
  return [
    defineAsyncCapability({
      name: "ldap_bind",
      description: "Simple bind; false when the server rejects the credentials",
      params: [
        { name: "url", shape: "string" },
        { name: "dn", shape: "string" },
        { name: "password", shape: "string" },
      ],
      failureValue: bool(false),
      parse: (args) => ({ url: args.string(0), dn: args.string(1), password: args.string(2) }),
      run: async (_ctx, { url, dn, password }) => bool(await services.directory.bind(url, dn, password)),
    }),

    defineCapability({
      name: "ldap_escape",
      description: "Escape a value for use in a distinguished name",
      params: [{ name: "value", shape: "string" }],
      parse: (args) => args.string(0),
      run: (_ctx, value) => str(escapeDnValue(value)),
    }),

    defineAsyncCapability({
      name: "ldap_search_bind",
      description: "Bind as a search user, look up uid=user and bind as the entry found",
      params: [
        { name: "url", shape: "string" },
        { name: "searchUser", shape: "string" },
        { name: "searchPassword", shape: "string" },
        { name: "baseDn", shape: "string" },
        { name: "user", shape: "string" },
        { name: "password", shape: "string" },
      ],
      failureValue: bool(false),
      parse: (args) => ({
        url: args.string(0),
        searchUser: args.string(1),
        searchPassword: args.string(2),
        baseDn: args.string(3),
        user: args.string(4),
        password: args.string(5),
      }),
      run: async (ctx, { url, searchUser, searchPassword, baseDn, user, password }) => {
        const outcome = await services.directory.searchBind(url, searchUser, searchPassword, baseDn, user, password);
        switch (outcome.kind) {
          case "authenticated":
            return bool(true);
          case "search-user-rejected":
            return ctx.fail("login with search user failed");
          case "not-found":
          case "rejected":
            return bool(false);
        }
      },
    }),
  ];
}
