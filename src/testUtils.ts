import { IN_MEMORY, openDeliveryDb, type SqliteDb } from "./db/db";
import type { ContentPlanEntry } from "./db/contentPlanRepo";
import type { UserRow } from "./db/usersRepo";
import type { EngineConfig } from "./engine";
import type { TransportError } from "./errors";
import type { MessageTransport } from "./transport/types";

// 2026-01-15T09:00:00.000Z
export const T0 = Date.UTC(2026, 0, 15, 9, 0, 0);

export const TEST_CONFIG: EngineConfig = {
  WORKER_ID: "worker-a",
  MAX_DELIVERY_ATTEMPTS: 5,
  SEND_TIMEOUT_MS: 50,
  RETRY_BASE_DELAY_MS: 30_000,
  RETRY_MAX_DELAY_MS: 600_000,
  DISPATCH_CONCURRENCY: 4,
  OUTCOME_LEASE_MS: 120_000
};

export function createTestDb(dbPath: string = IN_MEMORY): SqliteDb {
  return openDeliveryDb(dbPath);
}

export function makeUser(overrides: Partial<UserRow> = {}): UserRow {
  return {
    user_id: 1,
    telegram_id: "1001",
    username: null,
    name: null,
    user_url: null,
    referral_url: null,
    referrer_id: null,
    custom_fields: {},
    created_at: T0,
    updated_at: T0,
    ...overrides
  };
}

export function makeEntry(overrides: Partial<ContentPlanEntry> = {}): ContentPlanEntry {
  return {
    entry_id: 1,
    owner_id: 1,
    scheduled_at: T0,
    message_text: "",
    media_refs: [],
    status: "in_progress",
    claimed_by: "worker-a",
    claimed_at: T0,
    failure_reason: null,
    completed_at: null,
    created_at: T0 - 1000,
    updated_at: T0,
    ...overrides
  };
}

/** Scripted step for one send: deliver, fail with the given error, never settle, or wait for a release. */
export type ScriptedSend = "ok" | "hang" | TransportError | Promise<void>;

export type SentMessage = {
  address: string;
  text: string;
  mediaRefs: string[];
};

/** In-process transport. Unscripted sends succeed. */
export class FakeTransport implements MessageTransport {
  readonly calls: SentMessage[] = [];
  private readonly scripts = new Map<string, ScriptedSend[]>();

  script(address: string, ...steps: ScriptedSend[]): this {
    const queue = this.scripts.get(address) ?? [];
    queue.push(...steps);
    this.scripts.set(address, queue);
    return this;
  }

  /** Every send to `address` fails with `error`, until re-scripted. */
  alwaysFail(address: string, error: TransportError): this {
    this.scripts.set(address, new Array<ScriptedSend>(1000).fill(error));
    return this;
  }

  /** The next send to `address` stays in flight until the returned function is called, then succeeds. */
  hold(address: string): () => void {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.script(address, gate);
    return () => release();
  }

  async send(address: string, text: string, mediaRefs: readonly string[]): Promise<void> {
    this.calls.push({ address, text, mediaRefs: [...mediaRefs] });
    const step = this.scripts.get(address)?.shift() ?? "ok";
    if (step === "ok") return;
    if (step === "hang") return new Promise<void>(() => undefined);
    if (step instanceof Promise) return step;
    throw step;
  }

  sentTo(address: string): SentMessage[] {
    return this.calls.filter((call) => call.address === address);
  }
}
