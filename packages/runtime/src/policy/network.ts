/**
 * Network policy for outgoing HTTP requests: domain allow/deny lists,
 * IP literal hosts and response size
 */

import { parse as parseDomain } from "tldts";
import * as ipaddr from "ipaddr.js";
import type { NetworkPolicy } from "@capbridge/shared";

export interface PolicyDecision {
  allowed: boolean;
  reason?: string;
}

type HostMatcher = (host: string, registrable: string | null) => boolean;

export class NetworkPolicyEnforcer {
  private allow: HostMatcher[];
  private deny: HostMatcher[];

  constructor(private policy: NetworkPolicy) {
    this.allow = policy.allowedDomains.map(compilePattern);
    this.deny = policy.deniedDomains.map(compilePattern);
  }

  canFetch(url: URL): PolicyDecision {
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return { allowed: false, reason: `scheme not allowed: ${url.protocol}` };
    }

    const host = url.hostname.replace(/^\[(.*)\]$/, "$1");
    if (this.policy.denyIpLiterals && ipaddr.isValid(host)) {
      return { allowed: false, reason: `ip literal hosts are denied: ${host}` };
    }

    const registrable = parseDomain(host).domain;
    // deny wins over allow
    if (this.deny.some((match) => match(host, registrable))) {
      return { allowed: false, reason: `host denied: ${host}` };
    }
    if (!this.allow.some((match) => match(host, registrable))) {
      return { allowed: false, reason: `host not in allowlist: ${host}` };
    }
    return { allowed: true };
  }

  validateResponseSize(size: number): boolean {
    return size <= this.policy.maxBodyBytes;
  }

  get maxBodyBytes(): number {
    return this.policy.maxBodyBytes;
  }
}

/**
 * "*" matches everything, "*.example.com" the domain and its subdomains,
 * anything else the exact host or its registrable domain
 */
function compilePattern(pattern: string): HostMatcher {
  const normalized = pattern.toLowerCase();
  if (normalized === "*") {
    return () => true;
  }
  if (normalized.startsWith("*.")) {
    const suffix = normalized.slice(2);
    return (host) => host === suffix || host.endsWith(`.${suffix}`);
  }
  return (host, registrable) => host === normalized || registrable === normalized;
}
