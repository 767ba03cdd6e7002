import type { Duplex } from "node:stream";

import { endThenDestroyQuietly } from "../socketSafe.js";
import { formatOneLineUtf8 } from "../util/text.js";

export function httpStatusText(status: number): string {
  switch (status) {
    case 400:
      return "Bad Request";
    case 403:
      return "Forbidden";
    case 404:
      return "Not Found";
    case 408:
      return "Request Timeout";
    case 431:
      return "Request Header Fields Too Large";
    case 502:
      return "Bad Gateway";
    case 503:
      return "Service Unavailable";
    case 504:
      return "Gateway Timeout";
    case 505:
      return "HTTP Version Not Supported";
    default:
      return "Error";
  }
}

export function formatErrorResponse(status: number, message: string): string {
  const safeMessage = formatOneLineUtf8(message, 512) || httpStatusText(status);
  const body = `${safeMessage}\n`;
  return [
    `HTTP/1.1 ${status} ${httpStatusText(status)}`,
    "Content-Type: text/plain; charset=utf-8",
    `Content-Length: ${Buffer.byteLength(body)}`,
    "Connection: close",
    "",
    body,
  ].join("\r\n");
}

/**
 * Answers with a plain-text error and closes the connection. Only valid while no response bytes
 * have been written to `socket`.
 */
export function respondErrorAndClose(socket: Duplex, status: number, message: string): void {
  endThenDestroyQuietly(socket, formatErrorResponse(status, message));
}
