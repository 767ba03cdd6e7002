import { tryGetErrorCode } from "./errors.js";
import { formatOneLineError, formatOneLineUtf8 } from "./util/text.js";

/**
 * The slice of pino's logger the proxy core uses. Fastify's `app.log.child(...)` satisfies it.
 */
export type LoggerLike = {
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

export function formatError(err: unknown): { message: string; name?: string; code?: string } {
  if (err instanceof Error) {
    const safeMessage = formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES);
    let rawName = "Error";
    try {
      if (typeof err.name === "string") rawName = err.name;
    } catch {
      // ignore getters throwing
    }
    const safeName = formatOneLineUtf8(rawName, 128) || "Error";
    const code = tryGetErrorCode(err);
    return code === undefined ? { name: safeName, message: safeMessage } : { name: safeName, message: safeMessage, code };
  }
  return { message: formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES) };
}
