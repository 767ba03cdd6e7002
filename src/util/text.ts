const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8");

function coerceString(input: unknown): string {
  try {
    return String(input ?? "");
  } catch {
    return "";
  }
}

/**
 * Collapses control characters and runs of whitespace into single spaces and truncates the
 * result to `maxBytes` of UTF-8 without splitting a code point.
 *
 * Used for anything attacker-controlled that ends up in a log record or an error response body.
 */
export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return "";

  const buf = new Uint8Array(maxBytes);
  let written = 0;
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    const code = ch.codePointAt(0) ?? 0;
    const forbidden = code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
    if (forbidden || /\s/u.test(ch)) {
      pendingSpace = written > 0;
      continue;
    }

    if (pendingSpace) {
      const spaceRes = textEncoder.encodeInto(" ", buf.subarray(written));
      if (spaceRes.written === 0) break;
      written += spaceRes.written;
      pendingSpace = false;
      if (written >= maxBytes) break;
    }

    const res = textEncoder.encodeInto(ch, buf.subarray(written));
    if (res.written === 0) break;
    written += res.written;
    if (written >= maxBytes) break;
  }
  return written === 0 ? "" : textDecoder.decode(buf.subarray(0, written));
}

function errorMessageInput(err: unknown): string {
  if (err === null) return "null";
  if (typeof err === "string") return err;
  if (typeof err === "object") {
    try {
      const msg = (err as { message?: unknown }).message;
      if (typeof msg === "string") return msg;
    } catch {
      // ignore getters throwing
    }
    return "Error";
  }
  return coerceString(err);
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = "Error"): string {
  return formatOneLineUtf8(errorMessageInput(err), maxBytes) || fallback || "Error";
}

export function formatForError(value: string, maxLen = 128): string {
  if (maxLen <= 0) return `(${value.length} chars)`;
  if (value.length <= maxLen) return value;
  return `${value.slice(0, maxLen)}…(${value.length} chars)`;
}
