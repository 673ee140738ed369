/**
 * @module utils/network
 * @fileoverview SSRF guard for outbound page fetches.
 *
 * A crawler follows links it did not choose, so any page it reads can point
 * it at `http://169.254.169.254/` or `http://localhost:6379/`. Before each
 * request the target hostname is resolved and every address it maps to is
 * checked against the reserved ranges below.
 *
 * Documentation served from a local network can opt out with
 * `ALLOW_PRIVATE_NETWORK=true`; the fetch layer then skips this check.
 */

import dns from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import { FetchError, SecurityError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Reserved Ranges
 * ──────────────────────────────────────────────────────────────────────────── */

const IPV4_RESERVED: ReadonlyArray<readonly [string, number]> = [
  ["0.0.0.0", 8], // this network
  ["10.0.0.0", 8],
  ["100.64.0.0", 10], // CGNAT
  ["127.0.0.0", 8], // loopback
  ["169.254.0.0", 16], // link-local, cloud metadata
  ["172.16.0.0", 12],
  ["192.0.0.0", 24], // IETF protocol assignments
  ["192.168.0.0", 16],
  ["198.18.0.0", 15], // benchmarking
];

const IPV6_RESERVED: ReadonlyArray<readonly [string, number]> = [
  ["::", 128], // unspecified
  ["::1", 128], // loopback
  ["fc00::", 7], // unique local
  ["fe80::", 10], // link-local
];

const reserved = new BlockList();
for (const [network, prefix] of IPV4_RESERVED) {
  reserved.addSubnet(network, prefix, "ipv4");
}
for (const [network, prefix] of IPV6_RESERVED) {
  reserved.addSubnet(network, prefix, "ipv6");
}

/* ────────────────────────────────────────────────────────────────────────────
 * Address Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the embedded IPv4 address of an IPv4-mapped IPv6 address
 * (`::ffff:10.0.0.1` or `::ffff:a00:1`), or `null`.
 */
function mappedIPv4(ip: string): string | null {
  const dotted = /^(?:0{0,4}:){0,5}:?ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i.exec(ip);
  if (dotted) return dotted[1];

  const hex = /^(?:0{0,4}:){0,5}:?ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i.exec(ip);
  if (!hex) return null;
  const high = parseInt(hex[1], 16);
  const low = parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join(".");
}

/**
 * True when `ip` lies in a loopback, private, link-local or otherwise
 * non-routable range. Strings that are not IP addresses return `false`.
 *
 * @example
 * ```ts
 * isPrivateIP("10.1.2.3");          // true
 * isPrivateIP("::ffff:127.0.0.1");  // true
 * isPrivateIP("93.184.216.34");     // false
 * ```
 */
export function isPrivateIP(ip: string): boolean {
  const address = ip.split("%")[0];
  const family = isIP(address);

  if (family === 4) {
    return reserved.check(address, "ipv4");
  }
  if (family === 6) {
    const embedded = mappedIPv4(address);
    if (embedded !== null) return reserved.check(embedded, "ipv4");
    return reserved.check(address, "ipv6");
  }
  return false;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Hostname Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve `hostname` and reject it when any of its addresses is private.
 *
 * IP literals (including bracketed IPv6 from `URL.hostname`) are checked
 * directly. Resolution goes through the system resolver, so `/etc/hosts`
 * entries such as `localhost` are caught too.
 *
 * @throws {SecurityError} When an address is in a reserved range.
 * @throws {FetchError}    When the hostname does not resolve.
 */
export async function validateHostname(hostname: string): Promise<void> {
  const host = hostname.replace(/^\[(.*)\]$/, "$1");

  let addresses: string[];
  if (isIP(host) !== 0) {
    addresses = [host];
  } else {
    try {
      const records = await dns.lookup(host, { all: true, verbatim: true });
      addresses = records.map((record) => record.address);
    } catch (error) {
      throw new FetchError(`DNS lookup failed for '${host}'`, undefined, {
        cause: error,
      });
    }
  }

  if (addresses.length === 0) {
    throw new FetchError(`DNS lookup returned no addresses for '${host}'`);
  }

  const blocked = addresses.find((address) => isPrivateIP(address));
  if (blocked !== undefined) {
    throw new SecurityError(
      `Hostname '${host}' resolves to private address ${blocked}; ` +
        `set ALLOW_PRIVATE_NETWORK=true to crawl local documentation`,
    );
  }
}
