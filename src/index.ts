import "dotenv/config";

import express from "express";
import { Telegraf } from "telegraf";
import { loadEnv } from "./config/env";
import { logger } from "./logger";
import { openDeliveryDb } from "./db/db";
import { releaseMediaFiles, runDbMaintenance } from "./db/maintenance";
import { createDeliveryEngine } from "./engine";
import { startScheduler, type SchedulerHandle } from "./delivery/scheduler";
import { createTelegramTransport } from "./transport/telegramTransport";

const MAINTENANCE_INTERVAL_MS = 60 * 60 * 1000;

async function main() {
  const env = loadEnv(process.env);

  const db = openDeliveryDb(env.DB_PATH);
  logger.info({ dbPath: env.DB_PATH }, "SQLite ready");

  // Send-only: updates are handled by the bot process, this worker never calls launch().
  const bot = new Telegraf(env.BOT_TOKEN);
  const transport = createTelegramTransport(bot.telegram);
  const engine = createDeliveryEngine({ db, transport, config: env });

  let handle: SchedulerHandle | null = null;
  if (env.ENABLE_DELIVERY) {
    handle = startScheduler({ scheduler: engine.scheduler, intervalMs: env.TICK_INTERVAL_SECONDS * 1000 });
    logger.info(
      {
        workerId: env.WORKER_ID,
        tickIntervalSeconds: env.TICK_INTERVAL_SECONDS,
        maxAttempts: env.MAX_DELIVERY_ATTEMPTS,
        concurrency: env.DISPATCH_CONCURRENCY
      },
      "Delivery scheduler started"
    );
  } else {
    logger.warn("ENABLE_DELIVERY is off; scheduler not started");
  }

  const runMaintenance = async () => {
    const result = runDbMaintenance({ db, retentionDays: env.CONTENT_RETENTION_DAYS });
    if (result.deletedEntries === 0) return;
    const media = await releaseMediaFiles(result.releasedMediaRefs);
    logger.info(
      {
        deletedEntries: result.deletedEntries,
        removedMediaFiles: media.removed.length,
        missingMediaFiles: media.missing.length,
        failedMediaFiles: media.failed.length
      },
      "Purged finished content plan entries"
    );
  };

  const maintenanceInterval = setInterval(() => {
    runMaintenance().catch((err) => logger.error({ err }, "DB maintenance failed"));
  }, MAINTENANCE_INTERVAL_MS);
  maintenanceInterval.unref();

  const app = express();

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get("/status", (_req, res) => {
    res.status(200).json({
      ok: true,
      workerId: env.WORKER_ID,
      deliveryEnabled: env.ENABLE_DELIVERY,
      lastTick: handle?.lastReport() ?? null
    });
  });

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, "HTTP server listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.warn({ signal }, "Shutting down...");
    clearInterval(maintenanceInterval);

    // In-flight entries run to completion before the db closes.
    const stopped = handle ? handle.stop() : Promise.resolve();
    stopped
      .catch((err) => logger.error({ err }, "Scheduler did not stop cleanly"))
      .finally(() => {
        db.close();
        server.close(() => process.exit(0));
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
