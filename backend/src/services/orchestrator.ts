import type { AppConfig } from "../config.js";
import { createBreakers, type BreakerPolicy, type CollaboratorBreakers } from "../lib/circuitBreaker.js";
import type { CollaboratorName } from "../lib/errors.js";
import { createMetrics, type IntakeMetrics } from "../lib/metrics.js";
import type {
  ApplicationEvent,
  BatchReport,
  FollowupKind,
  ItemReport,
  ReviewEntry,
  TransitionLog,
  WorkflowRecord,
  WorkflowStage,
} from "../types/workflow.js";
import { createBatchCoordinator, type BatchOptions } from "./batchCoordinator.js";
import type { Poller } from "./gmailPoller.js";
import type { Notifier } from "./notifier.js";
import type { ObjectStore } from "./objectStore.js";
import type { ReviewQueue } from "./reviewQueue.js";
import { createStageExecutor, type ExecutorSettings, type ProcessOptions, type StageExecutorDeps } from "./stageExecutor.js";
import type { StructuredStore } from "./studentDirectory.js";
import type { Validator, ValidatorHealth } from "./validatorClient.js";
import type { WorkflowStore } from "./workflowStore.js";

export interface Orchestrator {
  processOne(event: ApplicationEvent, options?: ProcessOptions): Promise<ItemReport>;
  processBatch(events: ApplicationEvent[], options?: BatchOptions): Promise<BatchReport>;
  pollAndProcess(options?: BatchOptions): Promise<BatchReport>;
  processFollowups(kind: FollowupKind, options?: BatchOptions): Promise<BatchReport>;
  getStatus(applicationId: string): Promise<WorkflowRecord | undefined>;
  listByStage(stage?: WorkflowStage): Promise<WorkflowRecord[]>;
  getHistory(applicationId: string): Promise<TransitionLog[]>;
  listReviewQueue(): Promise<ReviewEntry[]>;
  findReviewEntry(studentId: string): Promise<ReviewEntry | undefined>;
  checkDependencies(): Promise<{ validator: ValidatorHealth }>;
  readonly metrics: IntakeMetrics;
}

export interface OrchestratorDeps {
  store: WorkflowStore;
  reviewQueue: ReviewQueue;
  directory: StructuredStore;
  objectStore: ObjectStore;
  notifier: Notifier;
  validator: Validator;
  poller: Poller;
  settings: ExecutorSettings;
  maxConcurrency: number;
  healthTimeoutMs: number;
  /** Without a policy collaborators are called without circuit breakers. */
  breakerPolicy?: BreakerPolicy;
  metrics?: IntakeMetrics;
  readAttachment?: StageExecutorDeps["readAttachment"];
  sleep?: StageExecutorDeps["sleep"];
}

export const executorSettingsFromConfig = (config: AppConfig): ExecutorSettings => {
  const backoff = { baseDelayMs: config.RETRY_BASE_DELAY_MS, maxDelayMs: config.RETRY_MAX_DELAY_MS };
  return {
    programName: config.PROGRAM_NAME,
    attachmentDir: config.ATTACHMENT_DIR,
    infoRequiredDeadlineDays: config.INFO_REQUIRED_DEADLINE_DAYS,
    presignedUrlTtlSeconds: config.PRESIGNED_URL_TTL_SECONDS,
    maxAttachmentBytes: config.MAX_ATTACHMENT_BYTES,
    allowedAttachmentTypes: config.ALLOWED_ATTACHMENT_TYPES,
    retry: {
      notify: { ...backoff, attempts: config.NOTIFY_RETRY_ATTEMPTS, timeoutMs: config.NOTIFY_TIMEOUT_MS },
      storage: { ...backoff, attempts: config.STORAGE_RETRY_ATTEMPTS, timeoutMs: config.STORAGE_TIMEOUT_MS },
      validation: { ...backoff, attempts: config.VALIDATION_RETRY_ATTEMPTS, timeoutMs: config.VALIDATION_TIMEOUT_MS },
    },
  };
};

const BREAKER_COLLABORATORS: readonly CollaboratorName[] = ["notifier", "objectStore", "validator", "poller"];

export const breakerPolicyFromConfig = (config: AppConfig): BreakerPolicy => ({
  failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
  recoveryTimeoutMs: config.BREAKER_RECOVERY_TIMEOUT_MS,
});

export const createOrchestrator = (deps: OrchestratorDeps): Orchestrator => {
  const metrics = deps.metrics ?? createMetrics();
  let breakers: CollaboratorBreakers = {};
  if (deps.breakerPolicy) {
    breakers = createBreakers(BREAKER_COLLABORATORS, deps.breakerPolicy, (collaborator, state) =>
      metrics.circuitOpen.set({ collaborator }, state === "OPEN" ? 1 : 0),
    );
    for (const collaborator of BREAKER_COLLABORATORS) {
      metrics.circuitOpen.set({ collaborator }, 0);
    }
  }

  const executor = createStageExecutor({ ...deps, metrics, breakers });
  const coordinator = createBatchCoordinator({
    executor,
    store: deps.store,
    poller: deps.poller,
    maxConcurrency: deps.maxConcurrency,
    metrics,
    breakers,
  });

  return {
    processOne: (event, options) => executor.processOne(event, options),
    processBatch: coordinator.processBatch,
    pollAndProcess: coordinator.pollAndProcess,
    processFollowups: coordinator.processFollowups,
    getStatus: (applicationId) => deps.store.get(applicationId),
    listByStage: (stage) => (stage ? deps.store.listByStage(stage) : deps.store.listAll()),
    getHistory: (applicationId) => deps.store.listTransitions(applicationId),
    listReviewQueue: () => deps.reviewQueue.listAll(),
    findReviewEntry: (studentId) => deps.reviewQueue.find(studentId),
    checkDependencies: async () => ({ validator: await deps.validator.health(deps.healthTimeoutMs) }),
    metrics,
  };
};
