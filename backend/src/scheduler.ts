import cron from "node-cron";
import { logger } from "./lib/logger.js";
import type { Orchestrator } from "./services/orchestrator.js";

export interface SchedulerOptions {
  pollCron: string;
  followupCron: string;
  signal?: AbortSignal;
}

export interface Schedulers {
  /** Stops the timers and resolves once any run already in progress has finished. */
  stop: () => Promise<void>;
}

export interface GuardedJob {
  run: () => Promise<void>;
  idle: () => Promise<void>;
}

/** Skips a tick while the previous run of the same job is still going. */
export const createGuardedJob = (name: string, job: () => Promise<unknown>): GuardedJob => {
  let current: Promise<void> | null = null;

  const run = async (): Promise<void> => {
    if (current) {
      logger.warn("Previous scheduled run still in progress; skipping", { job: name });
      return;
    }
    current = (async () => {
      try {
        await job();
      } catch (error) {
        logger.error("Scheduled run failed", { job: name, error });
      }
    })();
    try {
      await current;
    } finally {
      current = null;
    }
  };

  return {
    run,
    idle: async () => {
      await current;
    },
  };
};

export const startSchedulers = (orchestrator: Orchestrator, options: SchedulerOptions): Schedulers => {
  const poll = createGuardedJob("poll", () => orchestrator.pollAndProcess({ signal: options.signal }));
  const followups = createGuardedJob("followups", () =>
    orchestrator.processFollowups("information-required", { signal: options.signal }),
  );
  const pollTask = cron.schedule(options.pollCron, () => poll.run());
  const followupTask = cron.schedule(options.followupCron, () => followups.run());
  logger.info("Schedulers started", { pollCron: options.pollCron, followupCron: options.followupCron });

  return {
    stop: async () => {
      pollTask.stop();
      followupTask.stop();
      await Promise.all([poll.idle(), followups.idle()]);
      logger.info("Schedulers stopped");
    },
  };
};
