import { z } from "zod";
import type { ErrorKind } from "../lib/errors.js";

export const attachmentSchema = z.object({
  filename: z.string().min(1),
  contentType: z.string().min(1).default("application/octet-stream"),
  size: z.number().int().nonnegative(),
  // Local path written by the poller.
  location: z.string().min(1),
});

export const applicationEventSchema = z.object({
  eventId: z.string().min(1),
  sender: z.string(),
  senderName: z.string().default(""),
  subject: z.string().default(""),
  bodyText: z.string().default(""),
  attachments: z.array(attachmentSchema).default([]),
  receivedAt: z.coerce.date(),
  contentHash: z.string().default(""),
});

export type Attachment = z.infer<typeof attachmentSchema>;
export type ApplicationEvent = z.infer<typeof applicationEventSchema>;

export const WORKFLOW_STAGES = [
  "RECEIVED",
  "ACK_SENT",
  "DOCUMENTS_STORED",
  "VALIDATING",
  "VALIDATED",
  "NOTIFIED",
  "REVIEW_ADMITTED",
  "REJECTED",
] as const;

export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

export const TERMINAL_STAGES: ReadonlySet<WorkflowStage> = new Set(["REVIEW_ADMITTED", "REJECTED"]);

export const isTerminalStage = (stage: WorkflowStage): boolean => TERMINAL_STAGES.has(stage);

export const STAGE_OUTCOMES = ["success", "partial", "skipped", "fatal"] as const;

export type StageOutcome = (typeof STAGE_OUTCOMES)[number];

export interface Identity {
  applicationId: string;
  studentId: string;
  normalizedSender: string;
  fallback: boolean;
}

export interface WorkflowError {
  stage: WorkflowStage;
  kind: ErrorKind;
  message: string;
  at: string;
}

export const VALIDATION_VERDICTS = ["pass", "fail"] as const;

export type ValidationVerdict = (typeof VALIDATION_VERDICTS)[number];

export interface ValidationDetails {
  issues: string[];
  [key: string]: unknown;
}

export interface ValidationOutcome {
  verdict: ValidationVerdict;
  feedback: string;
  details: ValidationDetails;
  validatedAt: string;
}

export interface StoredAttachment {
  filename: string;
  objectName: string;
  contentType: string;
  size: number;
  storedAt: string;
}

export interface FailedAttachment {
  filename: string;
  error: string;
}

export interface WorkflowRecord {
  applicationId: string;
  studentId: string;
  studentEmail: string;
  studentName: string;
  stage: WorkflowStage;
  lastOutcome: StageOutcome;
  errors: WorkflowError[];
  validation: ValidationOutcome | null;
  attachments: Attachment[];
  storedAttachments: StoredAttachment[];
  failedAttachments: FailedAttachment[];
  attachmentsStored: number;
  attachmentsTotal: number;
  eventHashes: string[];
  generation: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface TransitionLog {
  id: number;
  applicationId: string;
  generation: number;
  fromStage: WorkflowStage | null;
  toStage: WorkflowStage;
  outcome: StageOutcome;
  detail: Record<string, unknown>;
  at: string;
}

export type TransitionInput = Omit<TransitionLog, "id" | "applicationId" | "generation" | "at">;

export interface ReviewEntry {
  applicationId: string;
  studentId: string;
  studentEmail: string;
  studentName: string;
  validationStatus: ValidationVerdict;
  feedback: string;
  generation: number;
  admittedAt: string;
}

export type ItemStatus = "completed" | "partial" | "waiting" | "failed" | "cancelled" | "unchanged";

export interface ItemError {
  applicationId: string;
  kind: ErrorKind;
  message: string;
  stage: WorkflowStage | null;
}

export interface ItemReport {
  eventId: string;
  applicationId: string;
  studentId: string;
  status: ItemStatus;
  stage: WorkflowStage | null;
  lastOutcome: StageOutcome | null;
  verdict: ValidationVerdict | null;
  stagesRun: WorkflowStage[];
  errors: ItemError[];
  durationMs: number;
}

export interface BatchReport {
  batchId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  submitted: number;
  succeeded: number;
  partial: number;
  failed: number;
  waiting: number;
  cancelled: number;
  unchanged: number;
  reviewAdmitted: number;
  rejected: number;
  items: ItemReport[];
  errors: ItemError[];
}

export const FOLLOWUP_KINDS = ["information-required"] as const;

export type FollowupKind = (typeof FOLLOWUP_KINDS)[number];

export const APPLICATION_STATUSES = [
  "received",
  "information_required",
  "validated",
  "validation_failed",
  "under_review",
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];
