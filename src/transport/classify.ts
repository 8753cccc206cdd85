import { TelegramError } from "telegraf";
import { TransportError } from "../errors";

const RETRYABLE_NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND", "EPIPE"]);

// Bot API answers these when the recipient (not the request) is the problem.
const PERMANENT_TELEGRAM_CODES = new Set([400, 403]);

function errorCode(err: unknown): string | null {
  if (!err || typeof err !== "object" || !("code" in err)) return null;
  const code = err.code;
  return typeof code === "string" ? code : null;
}

function errorName(err: unknown): string | null {
  return err instanceof Error ? err.name : null;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Maps anything a send can throw onto TransportError. Unrecognized failures are retryable. */
export function classifyTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;

  if (err instanceof TelegramError) {
    const reason = `${err.code}: ${err.description}`;
    if (err.code === 429) {
      const retryAfterSec = err.parameters?.retry_after;
      return new TransportError("retryable", reason, {
        cause: err,
        retryAfterMs: typeof retryAfterSec === "number" ? retryAfterSec * 1000 : undefined
      });
    }
    if (PERMANENT_TELEGRAM_CODES.has(err.code)) {
      return new TransportError("permanent", reason, { cause: err });
    }
    return new TransportError("retryable", reason, { cause: err });
  }

  const code = errorCode(err);
  if (code === "ENOENT") {
    return new TransportError("permanent", `media file missing: ${errorMessage(err)}`, { cause: err });
  }
  if (code && RETRYABLE_NETWORK_CODES.has(code)) {
    return new TransportError("retryable", `${code}: ${errorMessage(err)}`, { cause: err });
  }
  if (errorName(err) === "AbortError") {
    return new TransportError("retryable", "request aborted", { cause: err });
  }

  return new TransportError("retryable", errorMessage(err), { cause: err });
}
