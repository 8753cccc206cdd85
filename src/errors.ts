export type DeliveryErrorCode =
  | "user_not_found"
  | "entry_not_found"
  | "cyclic_referral"
  | "invalid_schedule"
  | "invalid_transition"
  | "transport_error";

/**
 * Base class for every error this package throws on purpose.
 * `code` is stable and meant for programmatic consumers (tick reports, monitoring); `message` is for humans.
 */
export class DeliveryError extends Error {
  public readonly code: DeliveryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: DeliveryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UserNotFoundError extends DeliveryError {
  constructor(public readonly userId: number | string) {
    super("user_not_found", `User not found: ${userId}`, { userId });
  }
}

export class EntryNotFoundError extends DeliveryError {
  constructor(public readonly entryId: number) {
    super("entry_not_found", `Content plan entry not found: ${entryId}`, { entryId });
  }
}

export class CyclicReferralError extends DeliveryError {
  constructor(
    public readonly userId: number | null,
    public readonly referrerId: number
  ) {
    super(
      "cyclic_referral",
      userId === null
        ? `Referrer ${referrerId} would close a referral cycle`
        : `Referrer ${referrerId} would close a referral cycle through user ${userId}`,
      { userId, referrerId }
    );
  }
}

export class InvalidScheduleError extends DeliveryError {
  constructor(
    public readonly scheduledAt: number,
    public readonly now: number
  ) {
    super("invalid_schedule", "scheduled_at must be strictly in the future", { scheduledAt, now });
  }
}

export class InvalidTransitionError extends DeliveryError {
  constructor(
    public readonly entryId: number,
    public readonly from: string,
    public readonly to: string,
    reason?: string
  ) {
    super(
      "invalid_transition",
      `Entry ${entryId} cannot move from ${from} to ${to}${reason ? `: ${reason}` : ""}`,
      { entryId, from, to }
    );
  }
}

export type TransportErrorKind = "retryable" | "permanent";

export class TransportError extends DeliveryError {
  public readonly kind: TransportErrorKind;
  public readonly reason: string;

  constructor(kind: TransportErrorKind, reason: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super("transport_error", `Transport ${kind} failure: ${reason}`, {
      kind,
      reason,
      retryAfterMs: options?.retryAfterMs
    });
    this.kind = kind;
    this.reason = reason;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  get retryable(): boolean {
    return this.kind === "retryable";
  }
}

export function isDeliveryError(err: unknown): err is DeliveryError {
  return err instanceof DeliveryError;
}

/** Flat log/report fields for any thrown value. */
export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof DeliveryError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "unexpected", message: err.message };
  return { code: "unexpected", message: String(err) };
}
