import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { TransientCollaboratorError } from "../src/lib/errors.js";
import { createMetrics } from "../src/lib/metrics.js";
import { createStageExecutor } from "../src/services/stageExecutor.js";
import type { WorkflowStore } from "../src/services/workflowStore.js";
import {
  ATTACHMENT_DIR,
  createHarness,
  failVerdict,
  hangUntilAborted,
  makeEvent,
  metricValue,
  noSleep,
  passVerdict,
  pdf,
  testSettings,
  type Harness,
} from "./helpers.js";

describe("stage executor", () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  afterEach(() => {
    harness.database.close();
  });

  it("runs a new application through to the review queue", async () => {
    const report = await harness.orchestrator.processOne(makeEvent());

    assert.equal(report.status, "completed");
    assert.equal(report.stage, "REVIEW_ADMITTED");
    assert.equal(report.verdict, "pass");
    assert.deepEqual(report.stagesRun, ["RECEIVED", "ACK_SENT", "DOCUMENTS_STORED", "VALIDATING", "VALIDATED", "NOTIFIED"]);
    assert.deepEqual(report.errors, []);
    assert.deepEqual(
      harness.notifier.sent.map((sent) => [sent.templateName, sent.recipient]),
      [
        ["application_received", "asha@example.edu"],
        ["validation_passed", "asha@example.edu"],
      ],
    );
    assert.deepEqual(harness.objectStore.puts, [
      `${report.studentId}/resume.pdf`,
      `${report.studentId}/marksheet.pdf`,
    ]);
    assert.deepEqual(harness.validator.requests[0]?.documents, [
      {
        name: "resume.pdf",
        contentType: "application/pdf",
        url: `https://objects.test/${report.studentId}/resume.pdf?ttl=600`,
      },
      {
        name: "marksheet.pdf",
        contentType: "application/pdf",
        url: `https://objects.test/${report.studentId}/marksheet.pdf?ttl=600`,
      },
    ]);

    const entries = await harness.reviewQueue.listAll();
    assert.equal(entries.length, 1);
    assert.equal(entries[0]?.applicationId, report.applicationId);
    assert.equal(entries[0]?.studentName, "Asha Rao");
    assert.equal(entries[0]?.generation, 1);
    assert.equal((await harness.directory.getApplication(report.applicationId))?.status, "under_review");

    const record = await harness.store.get(report.applicationId);
    assert.equal(record?.attachmentsStored, 2);
    assert.equal(record?.attachmentsTotal, 2);
    assert.equal((await harness.orchestrator.getHistory(report.applicationId)).length, 7);
  });

  it("leaves a finished application unchanged when the event is redelivered", async () => {
    await harness.orchestrator.processOne(makeEvent());
    const again = await harness.orchestrator.processOne(makeEvent());

    assert.equal(again.status, "unchanged");
    assert.equal(again.stage, "REVIEW_ADMITTED");
    assert.deepEqual(again.stagesRun, []);
    assert.equal(harness.notifier.sent.length, 2);
    assert.equal(harness.objectStore.puts.length, 2);
    assert.equal((await harness.reviewQueue.listAll()).length, 1);
  });

  it("marks validation fatal after three timeouts and resumes without re-uploading", async () => {
    harness.validator.behaviour = hangUntilAborted;

    const first = await harness.orchestrator.processOne(makeEvent());

    assert.equal(first.status, "failed");
    assert.equal(first.stage, "VALIDATING");
    assert.equal(first.lastOutcome, "fatal");
    assert.equal(harness.validator.requests.length, 3);
    assert.deepEqual(first.errors, [
      {
        applicationId: first.applicationId,
        kind: "RETRY_EXHAUSTED",
        message: "validate failed after 3 attempt(s): validate timed out after 200ms",
        stage: "VALIDATING",
      },
    ]);

    harness.validator.behaviour = passVerdict;
    const resumed = await harness.orchestrator.processOne(makeEvent());

    assert.equal(resumed.status, "completed");
    assert.deepEqual(resumed.stagesRun, ["VALIDATING", "VALIDATED", "NOTIFIED"]);
    assert.equal(harness.objectStore.puts.length, 2);
    assert.equal(harness.notifier.sent.filter((sent) => sent.templateName === "application_received").length, 1);
  });

  it("keeps the documents that uploaded when one of three fails", async () => {
    harness.objectStore.failing.add("marksheet.pdf");
    const event = makeEvent({ attachments: [pdf("resume.pdf"), pdf("marksheet.pdf"), pdf("reference.pdf")] });

    const report = await harness.orchestrator.processOne(event);
    const record = await harness.store.get(report.applicationId);
    const history = await harness.orchestrator.getHistory(report.applicationId);
    const upload = history.find((entry) => entry.toStage === "DOCUMENTS_STORED");

    assert.equal(report.status, "partial");
    assert.equal(report.stage, "REVIEW_ADMITTED");
    assert.deepEqual(report.errors, [
      {
        applicationId: report.applicationId,
        kind: "RETRY_EXHAUSTED",
        message: "marksheet.pdf: upload:marksheet.pdf failed after 3 attempt(s): upload of marksheet.pdf refused",
        stage: "ACK_SENT",
      },
    ]);
    assert.equal(upload?.outcome, "partial");
    assert.deepEqual(upload?.detail.uploaded, ["resume.pdf", "reference.pdf"]);
    assert.deepEqual(record?.failedAttachments, [
      {
        filename: "marksheet.pdf",
        error: "upload:marksheet.pdf failed after 3 attempt(s): upload of marksheet.pdf refused",
      },
    ]);
    assert.equal(record?.attachmentsStored, 2);
    assert.equal(record?.attachmentsTotal, 3);
    assert.deepEqual(
      harness.validator.requests[0]?.documents.map((document) => document.name),
      ["resume.pdf", "reference.pdf"],
    );
  });

  it("rejects disallowed and executable attachments without retrying", async () => {
    harness.files.set("/tmp/intake-test/scan.pdf", Buffer.from("MZ\x90\x00 not really a pdf"));
    const event = makeEvent({
      attachments: [pdf("resume.pdf"), pdf("setup.exe"), pdf("scan.pdf"), pdf("huge.pdf", 4096)],
    });

    const report = await harness.orchestrator.processOne(event);

    assert.deepEqual(
      report.errors.map((error) => [error.kind, error.message]),
      [
        ["MALFORMED_INPUT", "setup.exe: File type .exe is not allowed"],
        ["MALFORMED_INPUT", "scan.pdf: Executable content is not allowed"],
        ["MALFORMED_INPUT", "huge.pdf: File exceeds 1024 bytes"],
      ],
    );
    assert.deepEqual(harness.objectStore.puts, [`${report.studentId}/resume.pdf`]);
    assert.equal(report.stage, "REVIEW_ADMITTED");
  });

  it("refuses attachments that live outside the attachment directory", async () => {
    const event = makeEvent({
      attachments: [
        pdf("resume.pdf"),
        { ...pdf("cv.pdf"), location: "/etc/passwd" },
        { ...pdf("marksheet.pdf"), location: `${ATTACHMENT_DIR}/../server-secret.txt` },
      ],
    });

    const report = await harness.orchestrator.processOne(event);

    assert.deepEqual(
      report.errors.map((error) => [error.kind, error.stage, error.message]),
      [
        ["MALFORMED_INPUT", "ACK_SENT", "cv.pdf: Attachment location is outside the attachment directory"],
        ["MALFORMED_INPUT", "ACK_SENT", "marksheet.pdf: Attachment location is outside the attachment directory"],
      ],
    );
    assert.deepEqual(harness.objectStore.puts, [`${report.studentId}/resume.pdf`]);
  });

  it("gives attachments whose names clean up the same their own objects", async () => {
    const report = await harness.orchestrator.processOne(makeEvent({ attachments: [pdf("my cv.pdf"), pdf("my_cv.pdf")] }));
    const record = await harness.store.get(report.applicationId);

    assert.deepEqual(harness.objectStore.puts, [`${report.studentId}/my_cv.pdf`, `${report.studentId}/my_cv-2.pdf`]);
    assert.deepEqual(
      record?.storedAttachments.map((stored) => [stored.filename, stored.objectName]),
      [
        ["my cv.pdf", "my_cv.pdf"],
        ["my_cv.pdf", "my_cv-2.pdf"],
      ],
    );
    assert.deepEqual(
      harness.validator.requests[0]?.documents.map((document) => [document.name, document.url]),
      [
        ["my cv.pdf", `https://objects.test/${report.studentId}/my_cv.pdf?ttl=600`],
        ["my_cv.pdf", `https://objects.test/${report.studentId}/my_cv-2.pdf?ttl=600`],
      ],
    );
  });

  it("re-uploads a stored file that a follow-up replaces", async () => {
    const controller = new AbortController();
    harness.objectStore.onPut = () => controller.abort();

    const first = await harness.orchestrator.processOne(makeEvent(), { signal: controller.signal });

    assert.equal(first.status, "cancelled");
    assert.equal(first.stage, "DOCUMENTS_STORED");

    harness.objectStore.onPut = undefined;
    harness.files.set(`${ATTACHMENT_DIR}/resume.pdf`, Buffer.from("%PDF-1.7 revised resume"));
    const followup = await harness.orchestrator.processOne(
      makeEvent({ eventId: "evt-2", contentHash: "hash-2", attachments: [pdf("resume.pdf", 32)] }),
    );
    const record = await harness.store.get(followup.applicationId);

    assert.equal(followup.status, "completed");
    assert.deepEqual(followup.stagesRun, ["DOCUMENTS_STORED", "VALIDATING", "VALIDATED", "NOTIFIED"]);
    assert.deepEqual(harness.objectStore.puts, [
      `${followup.studentId}/resume.pdf`,
      `${followup.studentId}/marksheet.pdf`,
      `${followup.studentId}/resume.pdf`,
    ]);
    assert.equal(harness.objectStore.bodies.get(`${followup.studentId}/resume.pdf`), "%PDF-1.7 revised resume");
    assert.deepEqual(
      record?.storedAttachments.map((stored) => stored.filename),
      ["marksheet.pdf", "resume.pdf"],
    );
    assert.equal(record?.attachments.find((attachment) => attachment.filename === "resume.pdf")?.size, 32);
  });

  it("keeps attachments that arrive after validation began in the manifest without uploading them", async () => {
    harness.validator.behaviour = async () => {
      throw new TransientCollaboratorError("validator", "HTTP 503", 503);
    };
    const parked = await harness.orchestrator.processOne(makeEvent());

    assert.equal(parked.status, "failed");
    assert.equal(parked.stage, "VALIDATING");

    harness.validator.behaviour = passVerdict;
    const followup = await harness.orchestrator.processOne(
      makeEvent({ eventId: "evt-2", contentHash: "hash-2", attachments: [pdf("late.pdf")] }),
    );
    const record = await harness.store.get(followup.applicationId);

    assert.equal(followup.status, "completed");
    assert.deepEqual(followup.stagesRun, ["VALIDATING", "VALIDATED", "NOTIFIED"]);
    assert.equal(record?.attachmentsTotal, 3);
    assert.equal(record?.attachmentsStored, 2);
    assert.deepEqual(
      record?.attachments.map((attachment) => attachment.filename),
      ["resume.pdf", "marksheet.pdf", "late.pdf"],
    );
    assert.equal(harness.objectStore.puts.length, 2);
    assert.deepEqual(
      harness.validator.requests.at(-1)?.documents.map((document) => document.name),
      ["resume.pdf", "marksheet.pdf"],
    );
  });

  it("routes a failed verdict to rejection without touching the review queue", async () => {
    harness.validator.behaviour = failVerdict;

    const report = await harness.orchestrator.processOne(makeEvent());
    const history = await harness.orchestrator.getHistory(report.applicationId);

    assert.equal(report.status, "completed");
    assert.equal(report.stage, "REJECTED");
    assert.equal(report.verdict, "fail");
    assert.deepEqual(
      history.slice(-3).map((entry) => [entry.fromStage, entry.toStage]),
      [
        ["VALIDATING", "VALIDATED"],
        ["VALIDATED", "NOTIFIED"],
        ["NOTIFIED", "REJECTED"],
      ],
    );
    assert.deepEqual(
      harness.notifier.sent.map((sent) => sent.templateName),
      ["application_received", "validation_failed"],
    );
    assert.deepEqual(await harness.reviewQueue.listAll(), []);
    assert.equal((await harness.directory.getApplication(report.applicationId))?.status, "validation_failed");
  });

  it("fails a malformed sender at RECEIVED without contacting anyone", async () => {
    const report = await harness.orchestrator.processOne(makeEvent({ sender: "not an address", contentHash: "abc123" }));
    const record = await harness.store.get(report.applicationId);

    assert.equal(report.status, "failed");
    assert.equal(report.stage, "RECEIVED");
    assert.equal(report.lastOutcome, "fatal");
    assert.deepEqual(report.errors, [
      {
        applicationId: report.applicationId,
        kind: "MALFORMED_INPUT",
        message: 'Sender "not an address" has no valid email address',
        stage: "RECEIVED",
      },
    ]);
    assert.equal(record?.errors.length, 1);
    assert.deepEqual(harness.notifier.sent, []);
    assert.deepEqual(harness.objectStore.puts, []);
  });

  it("asks for documents and waits when none are attached", async () => {
    const report = await harness.orchestrator.processOne(makeEvent({ attachments: [] }));

    assert.equal(report.status, "waiting");
    assert.equal(report.stage, "DOCUMENTS_STORED");
    assert.deepEqual(report.stagesRun, ["RECEIVED", "ACK_SENT", "DOCUMENTS_STORED"]);
    assert.deepEqual(
      harness.notifier.sent.map((sent) => sent.templateName),
      ["information_required"],
    );
    assert.equal((await harness.directory.getApplication(report.applicationId))?.status, "information_required");

    const followup = await harness.orchestrator.processOne(
      makeEvent({ eventId: "evt-2", contentHash: "hash-2", subject: "Re: Action Required" }),
    );

    assert.equal(followup.status, "completed");
    assert.deepEqual(followup.stagesRun, ["DOCUMENTS_STORED", "VALIDATING", "VALIDATED", "NOTIFIED"]);
    assert.equal(harness.objectStore.puts.length, 2);
    assert.equal((await harness.store.get(report.applicationId))?.eventHashes.length, 2);
  });

  it("keeps going when a notification cannot be sent", async () => {
    harness.notifier.failures = 2;

    const report = await harness.orchestrator.processOne(makeEvent());

    assert.equal(report.status, "partial");
    assert.equal(report.stage, "REVIEW_ADMITTED");
    assert.deepEqual(
      report.errors.map((error) => [error.stage, error.kind]),
      [["RECEIVED", "RETRY_EXHAUSTED"]],
    );
    assert.deepEqual(
      harness.notifier.sent.map((sent) => sent.templateName),
      ["validation_passed"],
    );
  });

  it("stops before the next stage once cancelled", async () => {
    const controller = new AbortController();
    harness.notifier.onSend = () => controller.abort();

    const report = await harness.orchestrator.processOne(makeEvent(), { signal: controller.signal });

    assert.equal(report.status, "cancelled");
    assert.equal(report.stage, "ACK_SENT");
    assert.deepEqual(report.stagesRun, ["RECEIVED"]);
    assert.deepEqual(harness.objectStore.puts, []);

    harness.notifier.onSend = undefined;
    const resumed = await harness.orchestrator.processOne(makeEvent());

    assert.equal(resumed.status, "completed");
    assert.equal(resumed.stagesRun[0], "ACK_SENT");
  });

  it("starts a new generation when reprocessing a rejected application", async () => {
    harness.validator.behaviour = failVerdict;
    const rejected = await harness.orchestrator.processOne(makeEvent());
    harness.validator.behaviour = passVerdict;

    const report = await harness.orchestrator.processOne(
      makeEvent({ eventId: "evt-2", contentHash: "hash-2", attachments: [pdf("marksheet-v2.pdf")] }),
      { reprocess: true },
    );
    const record = await harness.store.get(report.applicationId);
    const entries = await harness.reviewQueue.listAll();

    assert.equal(report.applicationId, rejected.applicationId);
    assert.equal(report.status, "completed");
    assert.equal(report.stage, "REVIEW_ADMITTED");
    assert.equal(record?.generation, 2);
    assert.deepEqual(record?.attachments, [pdf("marksheet-v2.pdf")]);
    assert.deepEqual(record?.eventHashes, ["hash-1", "hash-2"]);
    assert.deepEqual(
      entries.map((entry) => [entry.applicationId, entry.generation]),
      [[report.applicationId, 2]],
    );
  });

  it("runs at most one pass per application at a time", async () => {
    const executor = createStageExecutor({
      store: harness.store,
      reviewQueue: harness.reviewQueue,
      directory: harness.directory,
      objectStore: harness.objectStore,
      notifier: harness.notifier,
      validator: harness.validator,
      settings: testSettings(),
      maxConcurrency: 3,
      sleep: noSleep,
      readAttachment: async () => Buffer.from("%PDF-1.7 test document"),
    });

    const first = executor.processOne(makeEvent());
    const second = executor.processOne(makeEvent({ eventId: "evt-duplicate" }));
    const applicationId = (await first).applicationId;
    const reports = [await first, await second];

    assert.deepEqual(
      reports.map((report) => report.status),
      ["completed", "unchanged"],
    );
    assert.equal(harness.objectStore.puts.length, 2);
    assert.equal(harness.validator.requests.length, 1);
    assert.equal((await harness.reviewQueue.listAll()).length, 1);
    assert.equal(executor.isRunning(applicationId), false);
  });

  it("reports an application as running while its pass is in flight", async () => {
    let release: () => void = () => undefined;
    harness.validator.behaviour = () =>
      new Promise((resolve) => {
        release = () => resolve({ verdict: "pass", feedback: "", details: { issues: [] } });
      });
    const executor = createStageExecutor({
      store: harness.store,
      reviewQueue: harness.reviewQueue,
      directory: harness.directory,
      objectStore: harness.objectStore,
      notifier: harness.notifier,
      validator: harness.validator,
      settings: testSettings(),
      maxConcurrency: 3,
      sleep: noSleep,
      readAttachment: async () => Buffer.from("%PDF-1.7 test document"),
    });

    const pending = executor.processOne(makeEvent());
    while (harness.validator.requests.length === 0) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    const applicationId = harness.validator.requests[0]?.applicationId ?? "";

    assert.equal(executor.isRunning(applicationId), true);
    release();
    assert.equal((await pending).status, "completed");
    assert.equal(executor.isRunning(applicationId), false);
  });

  it("reports a concurrent write to the record as a state conflict", async () => {
    let interfered = false;
    const store: WorkflowStore = {
      ...harness.store,
      upsert: async (record, transition) => {
        if (transition?.toStage === "ACK_SENT" && !interfered) {
          interfered = true;
          const current = await harness.store.get(record.applicationId);
          if (current) await harness.store.upsert(current);
        }
        return harness.store.upsert(record, transition);
      },
    };
    const metrics = createMetrics();
    const executor = createStageExecutor({
      store,
      reviewQueue: harness.reviewQueue,
      directory: harness.directory,
      objectStore: harness.objectStore,
      notifier: harness.notifier,
      validator: harness.validator,
      settings: testSettings(),
      maxConcurrency: 3,
      metrics,
      sleep: noSleep,
      readAttachment: async () => Buffer.from("%PDF-1.7 test document"),
    });

    const report = await executor.processOne(makeEvent());
    const record = await harness.store.get(report.applicationId);

    assert.equal(report.status, "failed");
    assert.equal(report.stage, "RECEIVED");
    assert.deepEqual(report.stagesRun, ["RECEIVED"]);
    assert.deepEqual(report.errors, [
      {
        applicationId: report.applicationId,
        kind: "STATE_CONFLICT",
        message: `Workflow record ${report.applicationId} changed since version 1`,
        stage: "RECEIVED",
      },
    ]);
    assert.equal(record?.stage, "RECEIVED");
    assert.equal(record?.version, 2);
    assert.deepEqual(harness.objectStore.puts, []);
    assert.equal(await metricValue(metrics, "intake_application_errors_total", { kind: "STATE_CONFLICT" }), 1);
    assert.equal(await metricValue(metrics, "intake_applications_processed_total", { status: "failed" }), 1);
  });
});

describe("stage executor behind circuit breakers", () => {
  it("stops calling the object store once its circuit opens", async () => {
    const harness = createHarness({ breakerPolicy: { failureThreshold: 2, recoveryTimeoutMs: 60_000 } });
    harness.objectStore.failing.add("resume.pdf");
    harness.objectStore.failing.add("marksheet.pdf");

    try {
      const report = await harness.orchestrator.processOne(makeEvent());

      assert.equal(report.status, "failed");
      assert.equal(report.stage, "ACK_SENT");
      assert.deepEqual(
        report.errors.map((error) => [error.kind, error.message]),
        [
          ["TRANSIENT_COLLABORATOR", "resume.pdf: objectStore circuit is open"],
          ["TRANSIENT_COLLABORATOR", "marksheet.pdf: objectStore circuit is open"],
        ],
      );
      const { metrics } = harness.orchestrator;
      assert.equal(await metricValue(metrics, "intake_circuit_breaker_open", { collaborator: "objectStore" }), 1);
      assert.equal(await metricValue(metrics, "intake_circuit_breaker_open", { collaborator: "validator" }), 0);
    } finally {
      harness.database.close();
    }
  });
});
