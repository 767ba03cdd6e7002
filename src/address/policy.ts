import net from "node:net";
import ipaddr from "ipaddr.js";

import { splitCommaSeparatedList } from "../csv.js";
import { formatForError, formatOneLineError } from "../util/text.js";

export type IpAddress = ipaddr.IPv4 | ipaddr.IPv6;
export type Cidr = [IpAddress, number];

export interface PortRange {
  from: number;
  to: number;
}

export interface ProxyPolicyInput {
  allowedPorts: string;
  denyCidrs: string;
  allowCidrs: string;
  allowPrivateIps: boolean;
  defaultPort: number;
}

export interface ProxyPolicy {
  readonly allowedPorts: readonly PortRange[];
  readonly deny: readonly Cidr[];
  readonly allow: readonly Cidr[];
  readonly allowPrivateIps: boolean;
  readonly defaultPort: number;
}

export type PolicyRejectionReason = "port-not-allowed" | "denylisted" | "non-public-address";

export type PolicyDecision = { allowed: true } | { allowed: false; reason: PolicyRejectionReason; message: string };

function isValidPortNumber(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= 65_535;
}

export function parsePortRanges(raw: string): PortRange[] {
  let entries: string[];
  try {
    entries = splitCommaSeparatedList(raw, { maxItems: 1024 });
  } catch (err) {
    throw new Error(`Invalid port list: ${formatOneLineError(err, 128)}`);
  }

  return entries.map((entry) => {
    const match = /^(\d{1,5})(?:-(\d{1,5}))?$/.exec(entry);
    if (!match) throw new Error(`Invalid port range: ${formatForError(entry)}`);
    const from = Number(match[1]);
    const to = match[2] === undefined ? from : Number(match[2]);
    if (!isValidPortNumber(from) || !isValidPortNumber(to) || from > to) {
      throw new Error(`Invalid port range: ${formatForError(entry)}`);
    }
    return { from, to };
  });
}

function parseCidr(entry: string): Cidr {
  const slash = entry.indexOf("/");
  const addressText = slash === -1 ? entry : entry.slice(0, slash);
  if (net.isIP(addressText) === 0) throw new Error(`Invalid CIDR: ${formatForError(entry)}`);

  if (slash === -1) {
    const addr = ipaddr.parse(addressText);
    return [addr, addr.kind() === "ipv4" ? 32 : 128];
  }
  if (!/^\d{1,3}$/.test(entry.slice(slash + 1))) throw new Error(`Invalid CIDR: ${formatForError(entry)}`);
  try {
    return ipaddr.parseCIDR(entry);
  } catch {
    throw new Error(`Invalid CIDR: ${formatForError(entry)}`);
  }
}

export function parseCidrList(raw: string): Cidr[] {
  let entries: string[];
  try {
    entries = splitCommaSeparatedList(raw, { maxItems: 4096 });
  } catch (err) {
    throw new Error(`Invalid CIDR list: ${formatOneLineError(err, 128)}`);
  }
  return entries.map(parseCidr);
}

export function compileProxyPolicy(input: ProxyPolicyInput): ProxyPolicy {
  const allowedPorts = parsePortRanges(input.allowedPorts);
  if (allowedPorts.length === 0) throw new Error("Allowed port list must not be empty");
  if (!isValidPortNumber(input.defaultPort)) throw new Error(`Invalid default port: ${input.defaultPort}`);

  return Object.freeze({
    allowedPorts: Object.freeze(allowedPorts),
    deny: Object.freeze(parseCidrList(input.denyCidrs)),
    allow: Object.freeze(parseCidrList(input.allowCidrs)),
    allowPrivateIps: input.allowPrivateIps,
    defaultPort: input.defaultPort,
  });
}

function matchesAny(addr: IpAddress, cidrs: readonly Cidr[]): boolean {
  // ipaddr.js throws when matching across families.
  return cidrs.some((cidr) => cidr[0].kind() === addr.kind() && addr.match(cidr));
}

/** The IPv4 address carried in the low 32 bits of a `64:ff9b::/96` (NAT64) address. */
function nat64Embedded(addr: IpAddress): IpAddress | null {
  if (addr.kind() !== "ipv6" || addr.range() !== "rfc6052") return null;
  return ipaddr.fromByteArray(addr.toByteArray().slice(12));
}

export function isPortAllowed(port: number, ranges: readonly PortRange[]): boolean {
  return ranges.some((r) => port >= r.from && port <= r.to);
}

/**
 * Decides whether the proxy may open a connection to `host:port`.
 *
 * `host` must be an IP literal. IPv4-mapped IPv6 addresses are judged as the IPv4 address they
 * carry, so `::ffff:169.254.169.254` is caught by an IPv4 deny entry. NAT64 addresses are also
 * checked against the deny list by their embedded IPv4 address.
 */
export function evaluateDestination(host: string, port: number, policy: ProxyPolicy): PolicyDecision {
  if (!isPortAllowed(port, policy.allowedPorts)) {
    return { allowed: false, reason: "port-not-allowed", message: `Port ${port} is not allowed` };
  }

  if (net.isIP(host) === 0) {
    return { allowed: false, reason: "non-public-address", message: "Destination is not an IP address" };
  }
  const addr = ipaddr.process(host);

  const original = ipaddr.parse(host);
  const embedded = nat64Embedded(original);
  if (
    matchesAny(addr, policy.deny) ||
    matchesAny(original, policy.deny) ||
    (embedded !== null && matchesAny(embedded, policy.deny))
  ) {
    return { allowed: false, reason: "denylisted", message: `Destination ${addr.toString()} is denied` };
  }

  if (matchesAny(addr, policy.allow) || matchesAny(original, policy.allow)) return { allowed: true };

  if (addr.range() !== "unicast" && !policy.allowPrivateIps) {
    return {
      allowed: false,
      reason: "non-public-address",
      message: `Destination ${addr.toString()} is not a public address`,
    };
  }

  return { allowed: true };
}
