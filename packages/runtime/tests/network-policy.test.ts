import { describe, it, expect } from "vitest";
import type { NetworkPolicy } from "@capbridge/shared";
import { NetworkPolicyEnforcer } from "../src/policy/network.js";

function enforcer(policy: Partial<NetworkPolicy>): NetworkPolicyEnforcer {
  return new NetworkPolicyEnforcer({
    allowedDomains: ["*"],
    deniedDomains: [],
    denyIpLiterals: false,
    maxBodyBytes: 1024,
    ...policy,
  });
}

describe("NetworkPolicyEnforcer", () => {
  it("matches wildcard patterns against the domain and its subdomains", () => {
    const policy = enforcer({ allowedDomains: ["*.example.com"] });

    expect(policy.canFetch(new URL("https://api.example.com/x")).allowed).toBe(true);
    expect(policy.canFetch(new URL("https://example.com/")).allowed).toBe(true);
    expect(policy.canFetch(new URL("https://badexample.com/"))).toEqual({
      allowed: false,
      reason: "host not in allowlist: badexample.com",
    });
  });

  it("matches plain patterns against the registrable domain", () => {
    expect(enforcer({ allowedDomains: ["example.com"] }).canFetch(new URL("http://www.example.com/")).allowed).toBe(
      true
    );
  });

  it("lets deny entries win over allow entries", () => {
    expect(enforcer({ deniedDomains: ["bad.example.com"] }).canFetch(new URL("http://bad.example.com/"))).toEqual({
      allowed: false,
      reason: "host denied: bad.example.com",
    });
  });

  it("denies IP literal hosts when configured", () => {
    const policy = enforcer({ denyIpLiterals: true });
    expect(policy.canFetch(new URL("http://[::1]:8080/")).reason).toBe("ip literal hosts are denied: ::1");
    expect(enforcer({}).canFetch(new URL("http://10.0.0.1/")).allowed).toBe(true);
  });

  it("only allows http and https", () => {
    expect(enforcer({}).canFetch(new URL("ftp://example.com/")).reason).toBe("scheme not allowed: ftp:");
  });

  it("checks response sizes against the limit", () => {
    const policy = enforcer({ maxBodyBytes: 10 });
    expect(policy.validateResponseSize(10)).toBe(true);
    expect(policy.validateResponseSize(11)).toBe(false);
  });
});
