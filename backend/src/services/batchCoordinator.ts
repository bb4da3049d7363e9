import { randomUUID } from "node:crypto";
import type { CollaboratorBreakers } from "../lib/circuitBreaker.js";
import { runWithConcurrency } from "../lib/concurrency.js";
import { toCollaboratorError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { IntakeMetrics } from "../lib/metrics.js";
import type { ApplicationEvent, BatchReport, FollowupKind, ItemReport } from "../types/workflow.js";
import type { Poller } from "./gmailPoller.js";
import { deriveIdentity } from "./identity.js";
import type { StageExecutor } from "./stageExecutor.js";
import type { WorkflowStore } from "./workflowStore.js";

export interface BatchOptions {
  signal?: AbortSignal;
  reprocess?: boolean;
}

export interface BatchCoordinator {
  processBatch(events: ApplicationEvent[], options?: BatchOptions): Promise<BatchReport>;
  pollAndProcess(options?: BatchOptions): Promise<BatchReport>;
  processFollowups(kind: FollowupKind, options?: BatchOptions): Promise<BatchReport>;
}

export interface BatchCoordinatorDeps {
  executor: StageExecutor;
  store: WorkflowStore;
  poller: Poller;
  maxConcurrency: number;
  metrics: IntakeMetrics;
  breakers?: CollaboratorBreakers;
}

const cancelledReport = (event: ApplicationEvent): ItemReport => {
  const identity = deriveIdentity(event);
  return {
    eventId: event.eventId,
    applicationId: identity.applicationId,
    studentId: identity.studentId,
    status: "cancelled",
    stage: null,
    lastOutcome: null,
    verdict: null,
    stagesRun: [],
    errors: [],
    durationMs: 0,
  };
};

export const summarizeBatch = (
  batchId: string,
  startedAt: Date,
  completedAt: Date,
  items: ItemReport[],
): BatchReport => {
  const count = (predicate: (item: ItemReport) => boolean): number => items.filter(predicate).length;
  return {
    batchId,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    durationMs: completedAt.getTime() - startedAt.getTime(),
    submitted: items.length,
    succeeded: count((item) => item.status === "completed"),
    partial: count((item) => item.status === "partial"),
    waiting: count((item) => item.status === "waiting"),
    failed: count((item) => item.status === "failed"),
    cancelled: count((item) => item.status === "cancelled"),
    unchanged: count((item) => item.status === "unchanged"),
    reviewAdmitted: count((item) => item.status !== "unchanged" && item.stage === "REVIEW_ADMITTED"),
    rejected: count((item) => item.status !== "unchanged" && item.stage === "REJECTED"),
    items,
    errors: items.flatMap((item) => item.errors),
  };
};

interface WorkItem {
  event: ApplicationEvent;
  reprocess: boolean;
}

export const createBatchCoordinator = (deps: BatchCoordinatorDeps): BatchCoordinator => {
  const fetchEvents = (load: () => Promise<ApplicationEvent[]>): Promise<ApplicationEvent[]> => {
    const guarded = async (): Promise<ApplicationEvent[]> => {
      try {
        return await load();
      } catch (error) {
        throw toCollaboratorError(error, "poller");
      }
    };
    const breaker = deps.breakers?.poller;
    return breaker ? breaker.call(guarded) : guarded();
  };

  const runItems = async (work: WorkItem[], signal?: AbortSignal): Promise<BatchReport> => {
    const batchId = randomUUID();
    const startedAt = new Date();
    logger.info("Batch started", { batchId, submitted: work.length, maxConcurrency: deps.maxConcurrency });

    const items = await runWithConcurrency(work, deps.maxConcurrency, async ({ event, reprocess }) => {
      if (signal?.aborted) {
        return cancelledReport(event);
      }
      return deps.executor.processOne(event, { reprocess, signal });
    });

    const report = summarizeBatch(batchId, startedAt, new Date(), items);
    deps.metrics.batchesProcessed.inc();
    deps.metrics.batchDuration.observe(report.durationMs / 1000);
    logger.info("Batch finished", {
      batchId,
      durationMs: report.durationMs,
      succeeded: report.succeeded,
      partial: report.partial,
      failed: report.failed,
      cancelled: report.cancelled,
      reviewAdmitted: report.reviewAdmitted,
      rejected: report.rejected,
    });
    return report;
  };

  const processBatch = (events: ApplicationEvent[], options: BatchOptions = {}): Promise<BatchReport> =>
    runItems(
      events.map((event) => ({ event, reprocess: options.reprocess ?? false })),
      options.signal,
    );

  const pollAndProcess = async (options: BatchOptions = {}): Promise<BatchReport> => {
    const events = await fetchEvents(() => deps.poller.fetchBatch());
    return processBatch(events, options);
  };

  /** Follow-ups for rejected applications start a new generation; others resume. */
  const processFollowups = async (kind: FollowupKind, options: BatchOptions = {}): Promise<BatchReport> => {
    const events = await fetchEvents(() => deps.poller.fetchFollowup(kind));
    const work: WorkItem[] = [];
    for (const event of events) {
      const record = await deps.store.get(deriveIdentity(event).applicationId);
      work.push({ event, reprocess: record?.stage === "REJECTED" });
    }
    return runItems(work, options.signal);
  };

  return { processBatch, pollAndProcess, processFollowups };
};
