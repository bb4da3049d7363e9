import { createDatabase, type DatabaseHandle } from "../src/db/client.js";
import type { BreakerPolicy } from "../src/lib/circuitBreaker.js";
import { TransientCollaboratorError } from "../src/lib/errors.js";
import type { IntakeMetrics } from "../src/lib/metrics.js";
import type { Poller } from "../src/services/gmailPoller.js";
import type { Notifier } from "../src/services/notifier.js";
import type { ObjectStore, PutResult } from "../src/services/objectStore.js";
import { createOrchestrator, type Orchestrator } from "../src/services/orchestrator.js";
import { createReviewQueue } from "../src/services/reviewQueue.js";
import type { ExecutorSettings } from "../src/services/stageExecutor.js";
import { createStudentDirectory } from "../src/services/studentDirectory.js";
import type { TemplateFieldsMap, TemplateName } from "../src/services/templates.js";
import type { ValidationRequest, ValidationResponse, Validator, ValidatorHealth } from "../src/services/validatorClient.js";
import { createWorkflowStore } from "../src/services/workflowStore.js";
import type { ApplicationEvent, Attachment, FollowupKind } from "../src/types/workflow.js";

export const ATTACHMENT_DIR = "/tmp/intake-test";

export const testSettings = (): ExecutorSettings => {
  const policy = { attempts: 3, baseDelayMs: 1, maxDelayMs: 4, timeoutMs: 200 };
  return {
    programName: "Test Program",
    attachmentDir: ATTACHMENT_DIR,
    infoRequiredDeadlineDays: 7,
    presignedUrlTtlSeconds: 600,
    maxAttachmentBytes: 1024,
    allowedAttachmentTypes: ["pdf", "docx", "png"],
    retry: { notify: { ...policy, attempts: 2 }, storage: policy, validation: policy },
  };
};

export const noSleep = async (): Promise<void> => undefined;

export const pdf = (filename: string, size = 16): Attachment => ({
  filename,
  contentType: "application/pdf",
  size,
  location: `${ATTACHMENT_DIR}/${filename}`,
});

export const makeEvent = (overrides: Partial<ApplicationEvent> = {}): ApplicationEvent => ({
  eventId: "evt-1",
  sender: "Asha Rao <asha@example.edu>",
  senderName: "Asha Rao",
  subject: "Internship application",
  bodyText: "I would like to apply for the internship.",
  attachments: [pdf("resume.pdf"), pdf("marksheet.pdf")],
  receivedAt: new Date("2025-03-10T09:00:00.000Z"),
  contentHash: "hash-1",
  ...overrides,
});

export interface SentNotification {
  templateName: TemplateName;
  recipient: string;
  applicationId: string;
}

export class FakeNotifier implements Notifier {
  readonly sent: SentNotification[] = [];
  failures = 0;
  onSend?: (templateName: TemplateName) => void;

  async sendTemplate<T extends TemplateName>(
    templateName: T,
    recipient: string,
    fields: TemplateFieldsMap[T],
  ): Promise<void> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransientCollaboratorError("notifier", "smtp unavailable", 503);
    }
    this.sent.push({ templateName, recipient, applicationId: fields.applicationId });
    this.onSend?.(templateName);
  }
}

export class FakeObjectStore implements ObjectStore {
  readonly puts: string[] = [];
  readonly failing = new Set<string>();
  readonly bodies = new Map<string, string>();
  onPut?: (key: string) => void;

  async put(studentId: string, objectName: string, bytes: Buffer): Promise<PutResult> {
    if (this.failing.has(objectName)) {
      throw new TransientCollaboratorError("objectStore", `upload of ${objectName} refused`, 503);
    }
    const key = `${studentId}/${objectName}`;
    this.puts.push(key);
    this.bodies.set(key, bytes.toString("utf8"));
    this.onPut?.(key);
    return { key, checksum: String(bytes.length) };
  }

  async getPresignedUrl(studentId: string, objectName: string, ttlSeconds: number): Promise<string> {
    return `https://objects.test/${studentId}/${objectName}?ttl=${ttlSeconds}`;
  }
}

export type ValidatorBehaviour = (request: ValidationRequest, signal?: AbortSignal) => Promise<ValidationResponse>;

export const passVerdict: ValidatorBehaviour = async () => ({
  verdict: "pass",
  feedback: "All documents look complete.",
  details: { issues: [] },
});

export const failVerdict: ValidatorBehaviour = async () => ({
  verdict: "fail",
  feedback: "Marksheet is unreadable.",
  details: { issues: ["Class 12 marksheet is blurred"] },
});

export const hangUntilAborted: ValidatorBehaviour = (_request, signal) =>
  new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

export class FakeValidator implements Validator {
  readonly requests: ValidationRequest[] = [];

  constructor(public behaviour: ValidatorBehaviour = passVerdict) {}

  async validate(request: ValidationRequest, signal?: AbortSignal): Promise<ValidationResponse> {
    this.requests.push(request);
    return this.behaviour(request, signal);
  }

  async health(): Promise<ValidatorHealth> {
    return { ok: true, status: "ok", latencyMs: 1 };
  }
}

export class FakePoller implements Poller {
  batch: ApplicationEvent[] = [];
  followups: ApplicationEvent[] = [];

  async fetchBatch(): Promise<ApplicationEvent[]> {
    return this.batch;
  }

  async fetchFollowup(_kind: FollowupKind): Promise<ApplicationEvent[]> {
    return this.followups;
  }
}

export interface Harness {
  database: DatabaseHandle;
  orchestrator: Orchestrator;
  notifier: FakeNotifier;
  objectStore: FakeObjectStore;
  validator: FakeValidator;
  poller: FakePoller;
  store: ReturnType<typeof createWorkflowStore>;
  directory: ReturnType<typeof createStudentDirectory>;
  reviewQueue: ReturnType<typeof createReviewQueue>;
  files: Map<string, Buffer>;
}

export interface HarnessOptions {
  maxConcurrency?: number;
  validator?: ValidatorBehaviour;
  breakerPolicy?: BreakerPolicy;
}

export const createHarness = (options: HarnessOptions = {}): Harness => {
  const database = createDatabase(":memory:");
  const store = createWorkflowStore(database.db);
  const directory = createStudentDirectory(database.db);
  const reviewQueue = createReviewQueue(database.db);
  const notifier = new FakeNotifier();
  const objectStore = new FakeObjectStore();
  const validator = new FakeValidator(options.validator);
  const poller = new FakePoller();
  const files = new Map<string, Buffer>();

  const orchestrator = createOrchestrator({
    store,
    reviewQueue,
    directory,
    objectStore,
    notifier,
    validator,
    poller,
    settings: testSettings(),
    maxConcurrency: options.maxConcurrency ?? 3,
    healthTimeoutMs: 50,
    breakerPolicy: options.breakerPolicy,
    sleep: noSleep,
    readAttachment: async (location) => files.get(location) ?? Buffer.from("%PDF-1.7 test document"),
  });

  return { database, orchestrator, notifier, objectStore, validator, poller, store, directory, reviewQueue, files };
};

/** Current value of a counter or gauge series; 0 when the series has not been touched. */
export const metricValue = async (
  metrics: IntakeMetrics,
  name: string,
  labels: Record<string, string> = {},
): Promise<number> => {
  const metric = (await metrics.registry.getMetricsAsJSON()).find((entry) => entry.name === name);
  const sample = metric?.values.find((value) =>
    Object.entries(labels).every(([key, expected]) => String(value.labels[key]) === expected),
  );
  return sample?.value ?? 0;
};
