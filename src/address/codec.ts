import net from "node:net";
import ipaddr from "ipaddr.js";

import { err, ok, type Result } from "../result.js";
import { formatForError } from "../util/text.js";
import { evaluateDestination, type PolicyRejectionReason, type ProxyPolicy } from "./policy.js";

/**
 * Where a request is forwarded, derived from its `Host` header.
 *
 * `host` is canonical text: dotted decimal for IPv4, RFC 5952 for IPv6.
 */
export interface DestinationAddress {
  host: string;
  family: 4 | 6;
  port: number;
  /** Whether the port was spelled out in the hostname, as opposed to the configured default. */
  portExplicit: boolean;
  /** Labels in front of the encoded address, joined by `.`; empty when there are none. */
  prefix: string;
}

export interface CodecOptions {
  domainSuffix: string;
}

export type DecodeResult = Result<DestinationAddress> & { reason?: PolicyRejectionReason };

const MAX_HOST_HEADER_LEN = 1024;
const MAX_HOSTNAME_LEN = 253;
const IPV6_MARKER = "v6-";

export function normalizeDomainSuffix(suffix: string): string {
  return suffix.trim().toLowerCase().replace(/^\.+/, "").replace(/\.+$/, "");
}

export function isValidDnsLabel(label: string): boolean {
  return label.length <= 63 && /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/.test(label);
}

function parseOctet(text: string): number | null {
  if (!/^(?:0|[1-9]\d{0,2})$/.test(text)) return null;
  const n = Number(text);
  return n <= 255 ? n : null;
}

function parsePort(text: string): number | null {
  if (!/^[1-9]\d{0,4}$/.test(text)) return null;
  const n = Number(text);
  return n <= 65_535 ? n : null;
}

function parseOctets(parts: readonly string[]): string | null {
  if (parts.length !== 4) return null;
  const octets: number[] = [];
  for (const part of parts) {
    const octet = parseOctet(part);
    if (octet === null) return null;
    octets.push(octet);
  }
  return octets.join(".");
}

type DecodedLiteral = { host: string; family: 4 | 6; port: number | null };

function decodeIpv6Label(label: string): DecodedLiteral | null {
  let body = label.slice(IPV6_MARKER.length);
  let port: number | null = null;

  const portMatch = /-p(\d+)$/.exec(body);
  if (portMatch) {
    port = parsePort(portMatch[1] ?? "");
    if (port === null) return null;
    body = body.slice(0, body.length - portMatch[0].length);
  }

  const text = body.replace(/-/g, ":");
  if (net.isIP(text) !== 6) return null;
  return { host: ipaddr.IPv6.parse(text).toRFC5952String(), family: 6, port };
}

function decodeDashedIpv4Label(label: string): DecodedLiteral | null {
  const parts = label.split("-");
  if (parts.length !== 4 && parts.length !== 5) return null;
  const host = parseOctets(parts.slice(0, 4));
  if (host === null) return null;

  const portText = parts[4];
  if (portText === undefined) return { host, family: 4, port: null };
  const port = parsePort(portText);
  return port === null ? null : { host, family: 4, port };
}

function stripListenPort(hostHeader: string): string | null {
  const colon = hostHeader.lastIndexOf(":");
  if (colon === -1) return hostHeader;
  if (!/^\d{1,5}$/.test(hostHeader.slice(colon + 1))) return null;
  return hostHeader.slice(0, colon);
}

/**
 * Syntax-only half of {@link decodeHostname}: turns a `Host` header into a destination without
 * consulting any policy.
 */
export function parseHostname(
  hostHeader: string,
  options: CodecOptions,
  defaultPort: number,
): { ok: true; value: DestinationAddress } | { ok: false; message: string } {
  const malformed = (message: string) => ({ ok: false as const, message });

  if (hostHeader.length === 0) return malformed("Host header is empty");
  if (hostHeader.length > MAX_HOST_HEADER_LEN) return malformed("Host header is too long");

  const withoutPort = stripListenPort(hostHeader.toLowerCase());
  if (withoutPort === null) return malformed(`Invalid Host header: ${formatForError(hostHeader)}`);
  const hostname = withoutPort.endsWith(".") ? withoutPort.slice(0, -1) : withoutPort;
  if (hostname.length === 0 || hostname.length > MAX_HOSTNAME_LEN) {
    return malformed(`Invalid Host header: ${formatForError(hostHeader)}`);
  }
  if (!/^[a-z0-9.-]+$/.test(hostname)) {
    return malformed(`Host contains characters outside [a-z0-9.-]: ${formatForError(hostHeader)}`);
  }

  const suffix = normalizeDomainSuffix(options.domainSuffix);
  if (!hostname.endsWith(`.${suffix}`)) {
    return malformed(`Host is not under .${suffix}: ${formatForError(hostname)}`);
  }

  const labels = hostname.slice(0, hostname.length - suffix.length - 1).split(".");
  if (labels.some((label) => label.length === 0)) return malformed(`Empty label in ${formatForError(hostname)}`);

  let literal: DecodedLiteral | null;
  let prefixLabels: string[];
  const last = labels[labels.length - 1] ?? "";

  if (/^\d+$/.test(last)) {
    // nip.io-style dotted quad: the final four labels are the octets.
    const host = labels.length >= 4 ? parseOctets(labels.slice(-4)) : null;
    literal = host === null ? null : { host, family: 4, port: null };
    prefixLabels = labels.slice(0, -4);
  } else if (last.startsWith(IPV6_MARKER)) {
    literal = decodeIpv6Label(last);
    prefixLabels = labels.slice(0, -1);
  } else {
    literal = decodeDashedIpv4Label(last);
    prefixLabels = labels.slice(0, -1);
  }

  if (literal === null) return malformed(`No address encoded in ${formatForError(hostname)}`);
  if (!prefixLabels.every(isValidDnsLabel)) return malformed(`Invalid label in ${formatForError(hostname)}`);

  return {
    ok: true,
    value: {
      host: literal.host,
      family: literal.family,
      port: literal.port ?? defaultPort,
      portExplicit: literal.port !== null,
      prefix: prefixLabels.join("."),
    },
  };
}

/**
 * Decodes the destination encoded in a `Host` header and checks it against `policy`.
 *
 * Never throws; failures come back as `MALFORMED_ADDRESS` or `POLICY_REJECTED`.
 *
 * @example
 * decodeHostname("api.127-0-0-1-8080.nip.io", { domainSuffix: "nip.io" }, policy)
 * // => { ok: true, value: { host: "127.0.0.1", family: 4, port: 8080, portExplicit: true, prefix: "api" } }
 */
export function decodeHostname(
  hostHeader: string,
  options: CodecOptions,
  policy: ProxyPolicy,
): DecodeResult {
  const parsed = parseHostname(hostHeader, options, policy.defaultPort);
  if (!parsed.ok) return err("MALFORMED_ADDRESS", parsed.message);

  const decision = evaluateDestination(parsed.value.host, parsed.value.port, policy);
  if (!decision.allowed) return { ...err<DestinationAddress>("POLICY_REJECTED", decision.message), reason: decision.reason };
  return ok(parsed.value);
}

/**
 * Inverse of {@link decodeHostname}: the hostname that routes to `address` under `suffix`.
 */
export function encodeAddress(address: DestinationAddress, suffix: string): string {
  let label: string;
  if (address.family === 6) {
    const text = ipaddr.IPv6.parse(address.host).toRFC5952String().replace(/:/g, "-");
    label = `${IPV6_MARKER}${text}${address.portExplicit ? `-p${address.port}` : ""}`;
  } else {
    label = `${address.host.split(".").join("-")}${address.portExplicit ? `-${address.port}` : ""}`;
  }
  const prefix = address.prefix ? `${address.prefix}.` : "";
  return `${prefix}${label}.${normalizeDomainSuffix(suffix)}`;
}
