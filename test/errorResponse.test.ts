import assert from "node:assert/strict";
import { once } from "node:events";
import { PassThrough } from "node:stream";
import test from "node:test";

import { AddressError, ClientProtocolError, UpstreamConnectError, classifyConnectError } from "../src/errors.js";
import { formatErrorResponse, httpStatusText, respondErrorAndClose } from "../src/http/response.js";

test("formatErrorResponse builds a plain-text response that closes the connection", () => {
  assert.equal(
    formatErrorResponse(403, "Port 22 is not allowed"),
    [
      "HTTP/1.1 403 Forbidden",
      "Content-Type: text/plain; charset=utf-8",
      "Content-Length: 23",
      "Connection: close",
      "",
      "Port 22 is not allowed\n",
    ].join("\r\n"),
  );
});

test("formatErrorResponse keeps the body on one line", () => {
  const response = formatErrorResponse(400, "bad\r\nInjected: yes");
  assert.ok(response.endsWith("\r\n\r\nbad Injected: yes\n"));
  assert.equal(formatErrorResponse(502, "").split("\r\n\r\n")[1], "Bad Gateway\n");
});

test("httpStatusText covers the statuses the proxy emits", () => {
  assert.equal(httpStatusText(400), "Bad Request");
  assert.equal(httpStatusText(408), "Request Timeout");
  assert.equal(httpStatusText(431), "Request Header Fields Too Large");
  assert.equal(httpStatusText(502), "Bad Gateway");
  assert.equal(httpStatusText(504), "Gateway Timeout");
  assert.equal(httpStatusText(505), "HTTP Version Not Supported");
  assert.equal(httpStatusText(418), "Error");
});

test("respondErrorAndClose writes the response and ends the stream", async () => {
  const socket = new PassThrough();
  const chunks: Buffer[] = [];
  socket.on("data", (chunk: Buffer) => chunks.push(chunk));
  const ended = once(socket, "end");
  respondErrorAndClose(socket, 504, "No activity for 10ms");
  await ended;
  const text = Buffer.concat(chunks).toString("utf8");
  assert.ok(text.startsWith("HTTP/1.1 504 Gateway Timeout\r\n"));
  assert.ok(text.endsWith("\r\n\r\nNo activity for 10ms\n"));
});

test("error classes map onto HTTP statuses", () => {
  assert.equal(new ClientProtocolError("ERR_HEAD_TOO_LARGE", "x").statusCode, 431);
  assert.equal(new ClientProtocolError("ERR_HEAD_TIMEOUT", "x").statusCode, 408);
  assert.equal(new AddressError("MALFORMED_ADDRESS", "x").statusCode, 400);
  assert.equal(new AddressError("POLICY_REJECTED", "x").statusCode, 403);
  assert.equal(new UpstreamConnectError("timeout", "x").statusCode, 504);
  assert.equal(new UpstreamConnectError("refused", "x").statusCode, 502);
});

test("classifyConnectError reads the socket error code", () => {
  const withCode = (code: string) => Object.assign(new Error(code), { code });
  assert.equal(classifyConnectError(withCode("ECONNREFUSED")), "refused");
  assert.equal(classifyConnectError(withCode("ETIMEDOUT")), "timeout");
  assert.equal(classifyConnectError(withCode("EHOSTUNREACH")), "unreachable");
  assert.equal(classifyConnectError(withCode("ECONNRESET")), "reset");
  assert.equal(classifyConnectError(new Error("other")), "error");
});
