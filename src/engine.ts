import type { Env } from "./config/env";
import type { SqliteDb } from "./db/db";
import { createDispatcher, type Dispatcher } from "./delivery/dispatcher";
import { createPersonalizer, type Personalizer } from "./delivery/personalize";
import { createDeliveryScheduler, type DeliveryScheduler } from "./delivery/scheduler";
import type { MessageTransport } from "./transport/types";

export type EngineConfig = Pick<
  Env,
  | "WORKER_ID"
  | "MAX_DELIVERY_ATTEMPTS"
  | "SEND_TIMEOUT_MS"
  | "RETRY_BASE_DELAY_MS"
  | "RETRY_MAX_DELAY_MS"
  | "DISPATCH_CONCURRENCY"
  | "OUTCOME_LEASE_MS"
>;

export type DeliveryEngine = {
  personalizer: Personalizer;
  dispatcher: Dispatcher;
  scheduler: DeliveryScheduler;
};

export function createDeliveryEngine(params: {
  db: SqliteDb;
  transport: MessageTransport;
  config: EngineConfig;
  clock?: () => number;
}): DeliveryEngine {
  const { db, transport, config, clock } = params;

  const personalizer = createPersonalizer(db);
  const dispatcher = createDispatcher({
    db,
    transport,
    personalizer,
    maxAttempts: config.MAX_DELIVERY_ATTEMPTS,
    sendTimeoutMs: config.SEND_TIMEOUT_MS,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: config.RETRY_MAX_DELAY_MS,
    workerId: config.WORKER_ID,
    leaseMs: config.OUTCOME_LEASE_MS,
    clock
  });
  const scheduler = createDeliveryScheduler({
    db,
    dispatcher,
    workerId: config.WORKER_ID,
    concurrency: config.DISPATCH_CONCURRENCY,
    leaseMs: config.OUTCOME_LEASE_MS,
    clock
  });

  return { personalizer, dispatcher, scheduler };
}
