import { readFile } from "node:fs/promises";
import path from "node:path";
import dayjs from "dayjs";
import type { CollaboratorBreakers } from "../lib/circuitBreaker.js";
import { KeyedMutex, Semaphore } from "../lib/concurrency.js";
import {
  MalformedInputError,
  errorKindOf,
  errorMessage,
  type ErrorKind,
} from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { createMetrics, type IntakeMetrics } from "../lib/metrics.js";
import { withRetry, type RetryPolicy } from "../lib/retry.js";
import {
  isTerminalStage,
  type ApplicationEvent,
  type Attachment,
  type FailedAttachment,
  type Identity,
  type ItemError,
  type ItemReport,
  type ItemStatus,
  type StageOutcome,
  type StoredAttachment,
  type TransitionInput,
  type WorkflowError,
  type WorkflowRecord,
  type WorkflowStage,
} from "../types/workflow.js";
import { fileExtension, safeFilename, uniqueObjectName } from "../utils/normalize.js";
import { deriveIdentity } from "./identity.js";
import type { Notifier } from "./notifier.js";
import type { ObjectStore } from "./objectStore.js";
import type { ReviewQueue } from "./reviewQueue.js";
import type { StructuredStore } from "./studentDirectory.js";
import type { TemplateFieldsMap, TemplateName } from "./templates.js";
import type { Validator } from "./validatorClient.js";
import type { WorkflowStore } from "./workflowStore.js";

export interface ExecutorSettings {
  programName: string;
  /** Attachment locations must resolve inside this directory. */
  attachmentDir: string;
  infoRequiredDeadlineDays: number;
  presignedUrlTtlSeconds: number;
  maxAttachmentBytes: number;
  allowedAttachmentTypes: string[];
  retry: {
    notify: RetryPolicy;
    storage: RetryPolicy;
    validation: RetryPolicy;
  };
}

export interface StageExecutorDeps {
  store: WorkflowStore;
  reviewQueue: ReviewQueue;
  directory: StructuredStore;
  objectStore: ObjectStore;
  notifier: Notifier;
  validator: Validator;
  settings: ExecutorSettings;
  /** Ceiling on runs in flight across every caller of this executor. */
  maxConcurrency: number;
  breakers?: CollaboratorBreakers;
  metrics?: IntakeMetrics;
  readAttachment?: (location: string) => Promise<Buffer>;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface ProcessOptions {
  reprocess?: boolean;
  signal?: AbortSignal;
}

export interface StageExecutor {
  processOne(event: ApplicationEvent, options?: ProcessOptions): Promise<ItemReport>;
  isRunning(applicationId: string): boolean;
}

interface StepResult {
  outcome: StageOutcome;
  // Undefined keeps the record where it is and ends the run.
  next?: WorkflowStage;
  record: WorkflowRecord;
  detail: Record<string, unknown>;
}

type Step = (record: WorkflowRecord, context: RunContext) => Promise<StepResult>;

interface RunContext {
  event: ApplicationEvent;
  identity: Identity;
  log: Logger;
  errors: WorkflowError[];
}

const EXECUTABLE_SIGNATURES = [Buffer.from("MZ"), Buffer.from([0x7f, 0x45, 0x4c, 0x46])];

const REQUIRED_DOCUMENTS = ["Resume / CV", "Academic marksheets", "Letter of recommendation"];

const now = (): string => new Date().toISOString();

const isExecutable = (bytes: Buffer): boolean =>
  EXECUTABLE_SIGNATURES.some((signature) => bytes.subarray(0, signature.length).equals(signature));

const mergeByFilename = (current: Attachment[], incoming: Attachment[]): Attachment[] => {
  const merged = new Map(current.map((attachment) => [attachment.filename, attachment]));
  for (const attachment of incoming) {
    merged.set(attachment.filename, attachment);
  }
  return Array.from(merged.values());
};

const withCounters = (record: WorkflowRecord): WorkflowRecord => ({
  ...record,
  attachmentsStored: record.storedAttachments.length,
  attachmentsTotal: record.attachments.length,
});

const isInside = (directory: string, location: string): boolean => {
  const relative = path.relative(path.resolve(directory), path.resolve(location));
  return relative !== "" && relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative);
};

const UPLOAD_OPEN_STAGES: ReadonlySet<WorkflowStage> = new Set(["RECEIVED", "ACK_SENT", "DOCUMENTS_STORED"]);

const newRecord = (event: ApplicationEvent, identity: Identity): WorkflowRecord =>
  withCounters({
    applicationId: identity.applicationId,
    studentId: identity.studentId,
    studentEmail: identity.normalizedSender,
    studentName: event.senderName,
    stage: "RECEIVED",
    lastOutcome: "success",
    errors: [],
    validation: null,
    attachments: event.attachments,
    storedAttachments: [],
    failedAttachments: [],
    attachmentsStored: 0,
    attachmentsTotal: 0,
    eventHashes: event.contentHash ? [event.contentHash] : [],
    generation: 1,
    version: 0,
    createdAt: now(),
    updatedAt: now(),
  });

const statusFor = (record: WorkflowRecord, runErrors: WorkflowError[], paused: boolean): ItemStatus => {
  if (record.lastOutcome === "fatal") return "failed";
  if (paused) return "waiting";
  if (isTerminalStage(record.stage)) return runErrors.length > 0 ? "partial" : "completed";
  return "partial";
};

export const createStageExecutor = (deps: StageExecutorDeps): StageExecutor => {
  const { store, reviewQueue, directory, objectStore, notifier, validator, settings } = deps;
  const readAttachment = deps.readAttachment ?? ((location: string) => readFile(location));
  const baseLogger = deps.logger ?? rootLogger;
  const breakers = deps.breakers ?? {};
  const metrics = deps.metrics ?? createMetrics();
  const locks = new KeyedMutex();
  const slots = new Semaphore(deps.maxConcurrency);

  const recordError = (context: RunContext, stage: WorkflowStage, kind: ErrorKind, message: string): WorkflowError => {
    const entry: WorkflowError = { stage, kind, message, at: now() };
    context.errors.push(entry);
    return entry;
  };

  const notify = async <T extends TemplateName>(
    context: RunContext,
    stage: WorkflowStage,
    record: WorkflowRecord,
    templateName: T,
    fields: TemplateFieldsMap[T],
  ): Promise<WorkflowError | null> => {
    try {
      await withRetry(() => notifier.sendTemplate(templateName, record.studentEmail, fields), settings.retry.notify, {
        label: `notify:${templateName}`,
        collaborator: "notifier",
        breaker: breakers.notifier,
        sleep: deps.sleep,
      });
      return null;
    } catch (error) {
      context.log.warn("Notification failed; continuing", { template: templateName, error: errorMessage(error) });
      return recordError(context, stage, errorKindOf(error), `${templateName}: ${errorMessage(error)}`);
    }
  };

  const baseFields = (record: WorkflowRecord) => ({
    studentName: record.studentName,
    studentId: record.studentId,
    applicationId: record.applicationId,
    programName: settings.programName,
  });

  const checkAttachment = async (attachment: Attachment): Promise<Buffer> => {
    if (!isInside(settings.attachmentDir, attachment.location)) {
      throw new MalformedInputError("Attachment location is outside the attachment directory");
    }
    const extension = fileExtension(attachment.filename);
    if (!settings.allowedAttachmentTypes.includes(extension)) {
      throw new MalformedInputError(`File type .${extension || "(none)"} is not allowed`);
    }
    if (attachment.size > settings.maxAttachmentBytes) {
      throw new MalformedInputError(`File exceeds ${settings.maxAttachmentBytes} bytes`);
    }
    const bytes = await readAttachment(attachment.location);
    if (bytes.length > settings.maxAttachmentBytes) {
      throw new MalformedInputError(`File exceeds ${settings.maxAttachmentBytes} bytes`);
    }
    if (isExecutable(bytes)) {
      throw new MalformedInputError("Executable content is not allowed");
    }
    return bytes;
  };

  /** Uploads manifest entries that are neither stored nor already failed. */
  const uploadPending = async (
    record: WorkflowRecord,
    context: RunContext,
    stage: WorkflowStage,
  ): Promise<{ record: WorkflowRecord; uploaded: string[]; failed: string[] }> => {
    const done = new Set([
      ...record.storedAttachments.map((stored) => stored.filename),
      ...record.failedAttachments.map((failed) => failed.filename),
    ]);
    const pending = record.attachments.filter((attachment) => !done.has(attachment.filename));
    const storedAttachments: StoredAttachment[] = [...record.storedAttachments];
    const failedAttachments: FailedAttachment[] = [...record.failedAttachments];
    const uploaded: string[] = [];
    const failed: string[] = [];

    for (const attachment of pending) {
      const objectName = uniqueObjectName(
        safeFilename(attachment.filename),
        new Set(storedAttachments.map((stored) => stored.objectName)),
      );
      try {
        const bytes = await checkAttachment(attachment);
        await withRetry(
          (signal) => objectStore.put(record.studentId, objectName, bytes, attachment.contentType, signal),
          settings.retry.storage,
          {
            label: `upload:${objectName}`,
            collaborator: "objectStore",
            breaker: breakers.objectStore,
            sleep: deps.sleep,
          },
        );
        storedAttachments.push({
          filename: attachment.filename,
          objectName,
          contentType: attachment.contentType,
          size: bytes.length,
          storedAt: now(),
        });
        uploaded.push(attachment.filename);
      } catch (error) {
        const message = errorMessage(error);
        context.log.warn("Attachment upload failed", { filename: attachment.filename, error: message });
        failedAttachments.push({ filename: attachment.filename, error: message });
        failed.push(attachment.filename);
        recordError(context, stage, errorKindOf(error), `${attachment.filename}: ${message}`);
      }
    }

    return { record: withCounters({ ...record, storedAttachments, failedAttachments }), uploaded, failed };
  };

  const steps: Partial<Record<WorkflowStage, Step>> = {
    RECEIVED: async (record, context) => {
      const hasAttachments = record.attachments.length > 0;
      const deadline = dayjs().add(settings.infoRequiredDeadlineDays, "day").toDate();
      let outcome: StageOutcome = "success";

      try {
        await directory.registerApplication({
          studentId: record.studentId,
          email: record.studentEmail,
          name: record.studentName,
          applicationId: record.applicationId,
          subject: context.event.subject,
          attachmentCount: record.attachments.length,
          status: hasAttachments ? "received" : "information_required",
          infoRequiredDeadline: hasAttachments ? null : deadline.toISOString(),
        });
      } catch (error) {
        outcome = "partial";
        context.log.warn("Structured store registration failed; continuing", { error: errorMessage(error) });
        recordError(context, "RECEIVED", errorKindOf(error), `register: ${errorMessage(error)}`);
      }

      const failure = hasAttachments
        ? await notify(context, "RECEIVED", record, "application_received", {
            ...baseFields(record),
            documents: record.attachments.map((attachment) => attachment.filename),
          })
        : await notify(context, "RECEIVED", record, "information_required", {
            ...baseFields(record),
            deadline,
            missing: REQUIRED_DOCUMENTS,
          });
      if (failure) outcome = "partial";

      return {
        outcome,
        next: "ACK_SENT",
        record,
        detail: { acknowledgment: hasAttachments ? "application_received" : "information_required" },
      };
    },

    ACK_SENT: async (record, context) => {
      if (record.attachments.length === 0) {
        return { outcome: "skipped", next: "DOCUMENTS_STORED", record, detail: { reason: "no attachments" } };
      }

      const result = await uploadPending(record, context, "ACK_SENT");
      const detail = { uploaded: result.uploaded, failed: result.record.failedAttachments };
      if (result.record.storedAttachments.length === 0) {
        return { outcome: "fatal", record: result.record, detail };
      }
      return {
        outcome: result.record.failedAttachments.length > 0 ? "partial" : "success",
        next: "DOCUMENTS_STORED",
        record: result.record,
        detail,
      };
    },

    DOCUMENTS_STORED: async (record, context) => {
      // Attachments merged in after the upload stage still go up before validation starts.
      const result = await uploadPending(record, context, "DOCUMENTS_STORED");
      if (result.record.storedAttachments.length === 0) {
        context.log.info("No stored documents; waiting for the student to send them");
        return { outcome: "skipped", record: result.record, detail: { reason: "awaiting documents" } };
      }
      return {
        outcome: result.failed.length > 0 ? "partial" : "success",
        next: "VALIDATING",
        record: result.record,
        detail: { documents: result.record.storedAttachments.length, uploaded: result.uploaded },
      };
    },

    VALIDATING: async (record, context) => {
      try {
        const documents = await Promise.all(
          record.storedAttachments.map(async (stored) => ({
            name: stored.filename,
            contentType: stored.contentType,
            url: await withRetry(
              () => objectStore.getPresignedUrl(record.studentId, stored.objectName, settings.presignedUrlTtlSeconds),
              settings.retry.storage,
              {
                label: `presign:${stored.objectName}`,
                collaborator: "objectStore",
                breaker: breakers.objectStore,
                sleep: deps.sleep,
              },
            ),
          })),
        );

        const response = await withRetry(
          (signal) =>
            validator.validate(
              {
                applicationId: record.applicationId,
                studentId: record.studentId,
                studentName: record.studentName,
                documents,
              },
              signal,
            ),
          settings.retry.validation,
          { label: "validate", collaborator: "validator", breaker: breakers.validator, sleep: deps.sleep },
        );

        const validated: WorkflowRecord = {
          ...record,
          validation: {
            verdict: response.verdict,
            feedback: response.feedback,
            details: response.details,
            validatedAt: now(),
          },
        };
        return { outcome: "success", next: "VALIDATED", record: validated, detail: { verdict: response.verdict } };
      } catch (error) {
        context.log.error("Validation failed", { error: errorMessage(error) });
        recordError(context, "VALIDATING", errorKindOf(error), errorMessage(error));
        return { outcome: "fatal", record, detail: { error: errorMessage(error) } };
      }
    },

    VALIDATED: async (record, context) => {
      const validation = record.validation;
      if (!validation) {
        throw new Error("Validated record has no validation outcome");
      }

      const failure =
        validation.verdict === "pass"
          ? await notify(context, "VALIDATED", record, "validation_passed", {
              ...baseFields(record),
              feedback: validation.feedback,
            })
          : await notify(context, "VALIDATED", record, "validation_failed", {
              ...baseFields(record),
              feedback: validation.feedback,
              issues: validation.details.issues,
            });

      return {
        outcome: failure ? "partial" : "success",
        next: "NOTIFIED",
        record,
        detail: { template: validation.verdict === "pass" ? "validation_passed" : "validation_failed" },
      };
    },

    NOTIFIED: async (record, context) => {
      const validation = record.validation;
      if (!validation) {
        throw new Error("Notified record has no validation outcome");
      }

      const passed = validation.verdict === "pass";
      let created = false;
      if (passed) {
        const appended = await reviewQueue.append({
          applicationId: record.applicationId,
          studentId: record.studentId,
          studentEmail: record.studentEmail,
          studentName: record.studentName,
          validationStatus: validation.verdict,
          feedback: validation.feedback,
          generation: record.generation,
          admittedAt: now(),
        });
        created = appended.created;
      }

      let outcome: StageOutcome = "success";
      try {
        await directory.updateApplicationStatus(record.applicationId, passed ? "under_review" : "validation_failed");
      } catch (error) {
        outcome = "partial";
        context.log.warn("Structured store status update failed", { error: errorMessage(error) });
        recordError(context, "NOTIFIED", errorKindOf(error), `status: ${errorMessage(error)}`);
      }

      return {
        outcome,
        next: passed ? "REVIEW_ADMITTED" : "REJECTED",
        record,
        detail: passed ? { reviewEntryCreated: created } : { verdict: validation.verdict },
      };
    },
  };

  const persist = async (
    record: WorkflowRecord,
    context: RunContext,
    errorsBefore: number,
    transition: TransitionInput,
  ): Promise<WorkflowRecord> => {
    const stored = await store.upsert(
      { ...record, errors: [...record.errors, ...context.errors.slice(errorsBefore)], lastOutcome: transition.outcome },
      transition,
    );
    metrics.stageTransitions.inc({ stage: transition.toStage, outcome: transition.outcome });
    return stored;
  };

  const prepare = async (
    event: ApplicationEvent,
    identity: Identity,
    options: ProcessOptions,
    context: RunContext,
  ): Promise<WorkflowRecord | ItemStatus> => {
    const existing = await store.get(identity.applicationId);

    if (identity.fallback) {
      const message = `Sender "${event.sender}" has no valid email address`;
      recordError(context, "RECEIVED", "MALFORMED_INPUT", message);
      if (!existing) {
        const record = newRecord(event, identity);
        await persist(record, context, 0, {
          fromStage: null,
          toStage: "RECEIVED",
          outcome: "fatal",
          detail: { eventId: event.eventId, reason: message },
        });
      }
      return "failed";
    }

    if (!existing) {
      const record = newRecord(event, identity);
      return persist(record, context, 0, {
        fromStage: null,
        toStage: "RECEIVED",
        outcome: "success",
        detail: { eventId: event.eventId, attachments: record.attachmentsTotal },
      });
    }

    if (options.reprocess) {
      const attachments = event.attachments.length > 0 ? event.attachments : existing.attachments;
      const reset = withCounters({
        ...existing,
        stage: "RECEIVED",
        studentName: event.senderName || existing.studentName,
        validation: null,
        attachments,
        storedAttachments: [],
        failedAttachments: [],
        eventHashes:
          event.contentHash && !existing.eventHashes.includes(event.contentHash)
            ? [...existing.eventHashes, event.contentHash]
            : existing.eventHashes,
        generation: existing.generation + 1,
      });
      context.log.info("Reprocessing application", { generation: reset.generation });
      return persist(reset, context, 0, {
        fromStage: existing.stage,
        toStage: "RECEIVED",
        outcome: "success",
        detail: { eventId: event.eventId, reprocess: true, generation: reset.generation },
      });
    }

    if (isTerminalStage(existing.stage)) {
      context.log.debug("Record already terminal; nothing to do", { stage: existing.stage });
      return "unchanged";
    }

    if (!event.contentHash || existing.eventHashes.includes(event.contentHash)) {
      return existing;
    }

    // New content on a live record: fold its attachments into the manifest, last write wins.
    const incoming = new Set(event.attachments.map((attachment) => attachment.filename));
    const uploadOpen = UPLOAD_OPEN_STAGES.has(existing.stage);
    if (!uploadOpen && incoming.size > 0) {
      context.log.warn("Attachments arrived after validation started; they are uploaded on reprocess", {
        stage: existing.stage,
        filenames: Array.from(incoming),
      });
    }
    return withCounters({
      ...existing,
      attachments: mergeByFilename(existing.attachments, event.attachments),
      storedAttachments: uploadOpen
        ? existing.storedAttachments.filter((stored) => !incoming.has(stored.filename))
        : existing.storedAttachments,
      failedAttachments: existing.failedAttachments.filter((failed) => !incoming.has(failed.filename)),
      eventHashes: [...existing.eventHashes, event.contentHash],
    });
  };

  const run = async (event: ApplicationEvent, identity: Identity, options: ProcessOptions): Promise<ItemReport> => {
    const startedAt = Date.now();
    const log = baseLogger.child({ applicationId: identity.applicationId, eventId: event.eventId });
    const context: RunContext = { event, identity, log, errors: [] };
    const stagesRun: WorkflowStage[] = [];
    let record: WorkflowRecord | undefined;

    const report = (finalStatus: ItemStatus): ItemReport => {
      const errors: ItemError[] = context.errors.map((entry) => ({
        applicationId: identity.applicationId,
        kind: entry.kind,
        message: entry.message,
        stage: entry.stage,
      }));
      return {
        eventId: event.eventId,
        applicationId: identity.applicationId,
        studentId: identity.studentId,
        status: finalStatus,
        stage: record?.stage ?? null,
        lastOutcome: record?.lastOutcome ?? null,
        verdict: record?.validation?.verdict ?? null,
        stagesRun,
        errors,
        durationMs: Date.now() - startedAt,
      };
    };

    try {
      if (options.signal?.aborted) {
        record = await store.get(identity.applicationId);
        log.info("Run cancelled before it started");
        return report("cancelled");
      }

      const prepared = await prepare(event, identity, options, context);
      if (typeof prepared === "string") {
        record = await store.get(identity.applicationId);
        return report(prepared);
      }
      record = prepared;

      let paused = false;
      while (!isTerminalStage(record.stage)) {
        if (options.signal?.aborted) {
          log.info("Run cancelled before stage", { stage: record.stage });
          return report("cancelled");
        }

        const stage: WorkflowStage = record.stage;
        const step = steps[stage];
        if (!step) {
          throw new Error(`No step registered for stage ${stage}`);
        }

        const errorsBefore = context.errors.length;
        stagesRun.push(stage);
        const result = await step(record, context);

        if (result.outcome === "fatal" || result.next === undefined) {
          record = await persist(result.record, context, errorsBefore, {
            fromStage: stage,
            toStage: stage,
            outcome: result.outcome,
            detail: result.detail,
          });
          paused = result.outcome !== "fatal";
          break;
        }

        record = await persist({ ...result.record, stage: result.next }, context, errorsBefore, {
          fromStage: stage,
          toStage: result.next,
          outcome: result.outcome,
          detail: result.detail,
        });
        log.debug("Stage transition", { from: stage, to: result.next, outcome: result.outcome });
      }

      const status = statusFor(record, context.errors, paused);
      log.info("Application run finished", { status, stage: record.stage, stagesRun });
      return report(status);
    } catch (error) {
      const kind = errorKindOf(error);
      log.error("Application run failed", { kind, error });
      const stage = record?.stage ?? "RECEIVED";
      recordError(context, stage, kind, errorMessage(error));
      if (record && kind !== "STATE_CONFLICT") {
        try {
          record = await persist(record, context, context.errors.length - 1, {
            fromStage: stage,
            toStage: stage,
            outcome: "fatal",
            detail: { error: errorMessage(error) },
          });
        } catch (persistError) {
          log.error("Could not record run failure", { error: persistError });
        }
      }
      return report("failed");
    }
  };

  const observe = (report: ItemReport): void => {
    metrics.applicationsProcessed.inc({ status: report.status });
    for (const error of report.errors) {
      metrics.applicationErrors.inc({ kind: error.kind });
    }
    metrics.applicationDuration.observe(report.durationMs / 1000);
  };

  // The identity lock is taken first so a run waiting on its own application holds no slot.
  const processOne = (event: ApplicationEvent, options: ProcessOptions = {}): Promise<ItemReport> => {
    const identity = deriveIdentity(event);
    metrics.queuedApplications.inc();
    return locks.runExclusive(identity.applicationId, () =>
      slots.run(async () => {
        metrics.queuedApplications.dec();
        metrics.activeApplications.inc();
        try {
          const report = await run(event, identity, options);
          observe(report);
          return report;
        } finally {
          metrics.activeApplications.dec();
        }
      }),
    );
  };

  return {
    processOne,
    isRunning: (applicationId) => locks.isLocked(applicationId),
  };
};
