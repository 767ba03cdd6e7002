export type ClientProtocolErrorCode =
  | "ERR_HEAD_MALFORMED"
  | "ERR_HEAD_TOO_LARGE"
  | "ERR_HEAD_TIMEOUT"
  | "ERR_UNSUPPORTED_VERSION"
  | "ERR_INVALID_HOST_HEADER"
  | "ERR_INVALID_FRAMING";

export type UpstreamConnectErrorKind = "timeout" | "refused" | "unreachable" | "reset" | "error";

/**
 * Base class for every per-request failure the proxy turns into an HTTP response.
 *
 * `statusCode` is only meaningful while the response head is still uncommitted; after that the
 * client connection is torn down instead.
 */
export abstract class ProxyError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
}

const CLIENT_PROTOCOL_STATUS: Readonly<Record<ClientProtocolErrorCode, number>> = {
  ERR_HEAD_MALFORMED: 400,
  ERR_HEAD_TOO_LARGE: 431,
  ERR_HEAD_TIMEOUT: 408,
  ERR_UNSUPPORTED_VERSION: 505,
  ERR_INVALID_HOST_HEADER: 400,
  ERR_INVALID_FRAMING: 400,
};

export class ClientProtocolError extends ProxyError {
  override name = "ClientProtocolError";
  readonly code: ClientProtocolErrorCode;
  readonly statusCode: number;

  constructor(code: ClientProtocolErrorCode, message: string) {
    super(message);
    this.code = code;
    this.statusCode = CLIENT_PROTOCOL_STATUS[code];
  }
}

export class AddressError extends ProxyError {
  override name = "AddressError";
  readonly code: "MALFORMED_ADDRESS" | "POLICY_REJECTED";
  readonly statusCode: number;

  constructor(code: "MALFORMED_ADDRESS" | "POLICY_REJECTED", message: string) {
    super(message);
    this.code = code;
    this.statusCode = code === "POLICY_REJECTED" ? 403 : 400;
  }
}

export class UpstreamConnectError extends ProxyError {
  override name = "UpstreamConnectError";
  readonly code = "ERR_UPSTREAM_CONNECT";
  readonly kind: UpstreamConnectErrorKind;
  readonly statusCode: number;

  constructor(kind: UpstreamConnectErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.statusCode = kind === "timeout" ? 504 : 502;
  }
}

export class UpstreamProtocolError extends ProxyError {
  override name = "UpstreamProtocolError";
  readonly code = "ERR_UPSTREAM_PROTOCOL";
  readonly statusCode = 502;
}

export class RelayTimeoutError extends ProxyError {
  override name = "RelayTimeoutError";
  readonly code = "ERR_RELAY_TIMEOUT";
  readonly statusCode = 504;
}

export function tryGetErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  try {
    const code = (err as { code?: unknown }).code;
    return typeof code === "string" ? code : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Maps a socket-level connect failure onto the kinds the dispatcher distinguishes.
 */
export function classifyConnectError(err: unknown): UpstreamConnectErrorKind {
  switch (tryGetErrorCode(err)) {
    case "ETIMEDOUT":
      return "timeout";
    case "ECONNREFUSED":
      return "refused";
    case "EHOSTUNREACH":
    case "ENETUNREACH":
    case "EADDRNOTAVAIL":
    case "ENOTFOUND":
      return "unreachable";
    case "ECONNRESET":
    case "EPIPE":
      return "reset";
    default:
      return "error";
  }
}
