import { createApp } from "./app.js";
import { config, hasGoogleConfig } from "./config.js";
import { createDatabase } from "./db/client.js";
import { logger } from "./lib/logger.js";
import { createMetrics } from "./lib/metrics.js";
import { startSchedulers, type Schedulers } from "./scheduler.js";
import { createGmailNotifier } from "./services/notifier.js";
import { createGmailPoller } from "./services/gmailPoller.js";
import { createMailboxService } from "./services/mailboxService.js";
import { createS3ObjectStore } from "./services/objectStore.js";
import { breakerPolicyFromConfig, createOrchestrator, executorSettingsFromConfig } from "./services/orchestrator.js";
import { createReviewQueue } from "./services/reviewQueue.js";
import { createStudentDirectory } from "./services/studentDirectory.js";
import { createHttpValidator } from "./services/validatorClient.js";
import { createWorkflowStore } from "./services/workflowStore.js";

const database = createDatabase(config.DATABASE_URL);
const shutdown = new AbortController();

const start = async (): Promise<void> => {
  const directory = createStudentDirectory(database.db);
  const mailbox = createMailboxService(database.db);

  const orchestrator = createOrchestrator({
    store: createWorkflowStore(database.db),
    reviewQueue: createReviewQueue(database.db),
    directory,
    objectStore: createS3ObjectStore({ bucket: config.S3_BUCKET }),
    notifier: createGmailNotifier(mailbox),
    validator: createHttpValidator(config.VALIDATOR_BASE_URL),
    poller: createGmailPoller({
      mailbox,
      directory,
      attachmentDir: config.ATTACHMENT_DIR,
      keywords: config.APPLICATION_KEYWORDS,
      lookbackDays: config.POLL_LOOKBACK_DAYS,
    }),
    settings: executorSettingsFromConfig(config),
    maxConcurrency: config.MAX_CONCURRENT_APPLICATIONS,
    healthTimeoutMs: config.HEALTH_TIMEOUT_MS,
    breakerPolicy: breakerPolicyFromConfig(config),
    metrics: createMetrics({ collectDefaults: true }),
  });

  const app = createApp({ orchestrator, mailbox, apiKey: config.API_KEY, corsOrigins: config.CORS_ORIGINS });
  let schedulers: Schedulers | null = null;

  const server = app.listen(config.PORT, config.HOST, () => {
    logger.info(`API listening on http://${config.HOST}:${config.PORT}`);
    if (!hasGoogleConfig) {
      logger.warn("Google OAuth is not configured; mailbox polling and notifications are unavailable");
    }
    schedulers = startSchedulers(orchestrator, {
      pollCron: config.POLL_CRON,
      followupCron: config.FOLLOWUP_POLL_CRON,
      signal: shutdown.signal,
    });
  });

  // Runs already in flight finish their current stage before the database closes.
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info("Shutting down", { signal });
    shutdown.abort();
    await schedulers?.stop();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    database.close();
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    stop(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
};

start().catch((error) => {
  logger.error("Failed to start server", error);
  database.close();
  process.exit(1);
});
