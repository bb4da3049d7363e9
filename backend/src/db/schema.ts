import { integer, sqliteTable, text, uniqueIndex, index } from "drizzle-orm/sqlite-core";
import {
  APPLICATION_STATUSES,
  STAGE_OUTCOMES,
  VALIDATION_VERDICTS,
  WORKFLOW_STAGES,
  type Attachment,
  type FailedAttachment,
  type StoredAttachment,
  type ValidationOutcome,
  type WorkflowError,
} from "../types/workflow.js";

export const workflowRecords = sqliteTable(
  "workflow_records",
  {
    applicationId: text("application_id").primaryKey(),
    studentId: text("student_id").notNull(),
    studentEmail: text("student_email").notNull(),
    studentName: text("student_name").notNull().default(""),
    stage: text("stage", { enum: WORKFLOW_STAGES }).notNull(),
    lastOutcome: text("last_outcome", { enum: STAGE_OUTCOMES }).notNull(),
    errors: text("errors", { mode: "json" }).$type<WorkflowError[]>().notNull(),
    validation: text("validation", { mode: "json" }).$type<ValidationOutcome | null>(),
    attachments: text("attachments", { mode: "json" }).$type<Attachment[]>().notNull(),
    storedAttachments: text("stored_attachments", { mode: "json" }).$type<StoredAttachment[]>().notNull(),
    failedAttachments: text("failed_attachments", { mode: "json" }).$type<FailedAttachment[]>().notNull(),
    attachmentsStored: integer("attachments_stored").notNull().default(0),
    attachmentsTotal: integer("attachments_total").notNull().default(0),
    eventHashes: text("event_hashes", { mode: "json" }).$type<string[]>().notNull(),
    generation: integer("generation").notNull().default(1),
    version: integer("version").notNull(),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    stageIdx: index("workflow_records_stage_idx").on(table.stage),
  }),
);

export const workflowTransitions = sqliteTable(
  "workflow_transitions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    applicationId: text("application_id").notNull(),
    generation: integer("generation").notNull(),
    fromStage: text("from_stage", { enum: WORKFLOW_STAGES }),
    toStage: text("to_stage", { enum: WORKFLOW_STAGES }).notNull(),
    outcome: text("outcome", { enum: STAGE_OUTCOMES }).notNull(),
    detail: text("detail", { mode: "json" }).$type<Record<string, unknown>>().notNull(),
    at: text("at").notNull(),
  },
  (table) => ({
    applicationIdx: index("workflow_transitions_application_idx").on(table.applicationId),
  }),
);

export const reviewEntries = sqliteTable(
  "review_entries",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    applicationId: text("application_id").notNull(),
    studentId: text("student_id").notNull(),
    studentEmail: text("student_email").notNull(),
    studentName: text("student_name").notNull(),
    validationStatus: text("validation_status", { enum: VALIDATION_VERDICTS }).notNull(),
    feedback: text("feedback").notNull(),
    generation: integer("generation").notNull(),
    admittedAt: text("admitted_at").notNull(),
  },
  (table) => ({
    applicationGenerationIdx: uniqueIndex("review_entries_application_generation_idx").on(
      table.applicationId,
      table.generation,
    ),
    studentIdx: index("review_entries_student_idx").on(table.studentId),
  }),
);

export const students = sqliteTable("students", {
  studentId: text("student_id").primaryKey(),
  email: text("email").notNull().unique(),
  name: text("name").notNull().default(""),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export const applications = sqliteTable(
  "applications",
  {
    applicationId: text("application_id").primaryKey(),
    studentId: text("student_id")
      .notNull()
      .references(() => students.studentId),
    subject: text("subject").notNull().default(""),
    status: text("status", { enum: APPLICATION_STATUSES }).notNull(),
    attachmentCount: integer("attachment_count").notNull().default(0),
    infoRequiredDeadline: text("info_required_deadline"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    statusIdx: index("applications_status_idx").on(table.status),
  }),
);

export const mailboxAccounts = sqliteTable("mailbox_accounts", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  email: text("email").notNull().unique(),
  accessToken: text("access_token"),
  refreshToken: text("refresh_token").notNull(),
  tokenExpiry: text("token_expiry"),
  lastPolledAt: text("last_polled_at"),
  createdAt: text("created_at").notNull(),
  updatedAt: text("updated_at").notNull(),
});

export type WorkflowRecordRow = typeof workflowRecords.$inferSelect;
export type WorkflowTransitionRow = typeof workflowTransitions.$inferSelect;
export type ReviewEntryRow = typeof reviewEntries.$inferSelect;
export type StudentRow = typeof students.$inferSelect;
export type ApplicationRow = typeof applications.$inferSelect;
export type MailboxAccount = typeof mailboxAccounts.$inferSelect;
