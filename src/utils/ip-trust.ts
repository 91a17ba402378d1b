/**
 * Client address behind reverse proxies
 *
 * X-Forwarded-For and X-Real-IP are honoured only when the socket peer sits
 * in a trusted range; from anyone else they are ignored, so a client cannot
 * pick the address its rate-limit bucket is keyed on.
 */

import { BlockList, isIP } from "node:net";
import { createLogger } from "../logging";

const log = createLogger("ip-trust");

type Family = "ipv4" | "ipv6";

export interface CIDR {
  address: string;
  prefix: number;
  family: Family;
}

/** Private networks, loopback and link-local */
export const DEFAULT_TRUSTED_CIDRS = [
  "127.0.0.0/8",
  "10.0.0.0/8",
  "172.16.0.0/12",
  "192.168.0.0/16",
  "::1/128",
  "fc00::/7",
  "fe80::/10",
];

/**
 * Dual-stack sockets report IPv4 peers as ::ffff:a.b.c.d
 */
export function normalizeIP(ip: string): string {
  const mapped = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(ip);
  return mapped?.[1] ?? ip;
}

function familyOf(ip: string): Family | null {
  switch (isIP(ip)) {
    case 4:
      return "ipv4";
    case 6:
      return "ipv6";
    default:
      return null;
  }
}

/**
 * "a.b.c.d/n" or a bare address, which covers just itself
 */
export function parseCIDR(cidr: string): CIDR | null {
  const [rawAddress = "", rawPrefix] = cidr.trim().split("/");
  const address = normalizeIP(rawAddress);
  const family = familyOf(address);
  if (!family) return null;

  const width = family === "ipv4" ? 32 : 128;
  if (rawPrefix === undefined) return { address, prefix: width, family };
  if (!/^\d{1,3}$/.test(rawPrefix)) return null;

  const prefix = Number(rawPrefix);
  return prefix <= width ? { address, prefix, family } : null;
}

export interface ProxyTrust {
  isTrustedProxy(directIP: string | undefined): boolean;
  /** The address rate limits are keyed on */
  getClientIP(directIP: string | undefined, forwardedFor: string | undefined, realIP: string | undefined): string;
}

/**
 * @param cidrs trusted proxy ranges; null uses DEFAULT_TRUSTED_CIDRS
 */
export function createProxyTrust(cidrs: string[] | null = null): ProxyTrust {
  const trusted = new BlockList();
  let count = 0;
  for (const entry of cidrs ?? DEFAULT_TRUSTED_CIDRS) {
    const cidr = parseCIDR(entry);
    if (!cidr) {
      log.warn("Invalid CIDR in TRUSTED_PROXY_CIDRS, skipping", { cidr: entry });
      continue;
    }
    trusted.addSubnet(cidr.address, cidr.prefix, cidr.family);
    count++;
  }
  log.debug("Trusted proxy ranges loaded", { count, source: cidrs ? "environment" : "defaults" });

  const isTrustedProxy = (directIP: string | undefined): boolean => {
    if (directIP === undefined) return false;
    const ip = normalizeIP(directIP.trim());
    const family = familyOf(ip);
    return family !== null && trusted.check(ip, family);
  };

  return {
    isTrustedProxy,

    getClientIP(directIP, forwardedFor, realIP) {
      // Without a socket address there is nothing to check trust against
      if (directIP === undefined || familyOf(normalizeIP(directIP)) === null) {
        return "unknown";
      }
      const direct = normalizeIP(directIP);
      if (!isTrustedProxy(direct)) return direct;

      const claimed = normalizeIP((forwardedFor?.split(",")[0] ?? realIP ?? "").trim());
      return familyOf(claimed) ? claimed : direct;
    },
  };
}
