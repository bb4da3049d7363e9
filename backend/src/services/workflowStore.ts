import { and, asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db/client.js";
import { workflowRecords, workflowTransitions, type WorkflowRecordRow } from "../db/schema.js";
import { StateConflictError } from "../lib/errors.js";
import type { TransitionInput, TransitionLog, WorkflowRecord, WorkflowStage } from "../types/workflow.js";

export interface WorkflowStore {
  get(applicationId: string): Promise<WorkflowRecord | undefined>;
  /**
   * Writes the record and its audit row in one transaction. `record.version`
   * must be the version that was read (0 for a new record); the stored copy is
   * returned with the bumped version.
   */
  upsert(record: WorkflowRecord, transition?: TransitionInput): Promise<WorkflowRecord>;
  listByStage(stage: WorkflowStage): Promise<WorkflowRecord[]>;
  listAll(): Promise<WorkflowRecord[]>;
  listTransitions(applicationId: string): Promise<TransitionLog[]>;
}

const toRecord = (row: WorkflowRecordRow): WorkflowRecord => ({
  applicationId: row.applicationId,
  studentId: row.studentId,
  studentEmail: row.studentEmail,
  studentName: row.studentName,
  stage: row.stage,
  lastOutcome: row.lastOutcome,
  errors: row.errors,
  validation: row.validation ?? null,
  attachments: row.attachments,
  storedAttachments: row.storedAttachments,
  failedAttachments: row.failedAttachments,
  attachmentsStored: row.attachmentsStored,
  attachmentsTotal: row.attachmentsTotal,
  eventHashes: row.eventHashes,
  generation: row.generation,
  version: row.version,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const createWorkflowStore = (db: AppDatabase): WorkflowStore => {
  const get = async (applicationId: string): Promise<WorkflowRecord | undefined> => {
    const row = db.select().from(workflowRecords).where(eq(workflowRecords.applicationId, applicationId)).get();
    return row ? toRecord(row) : undefined;
  };

  const upsert = async (record: WorkflowRecord, transition?: TransitionInput): Promise<WorkflowRecord> => {
    const now = new Date().toISOString();
    const stored: WorkflowRecord = {
      ...record,
      version: record.version + 1,
      updatedAt: now,
      createdAt: record.version === 0 ? now : record.createdAt,
    };

    db.transaction((tx) => {
      if (record.version === 0) {
        const existing = tx
          .select({ version: workflowRecords.version })
          .from(workflowRecords)
          .where(eq(workflowRecords.applicationId, record.applicationId))
          .get();
        if (existing) {
          throw new StateConflictError(record.applicationId, record.version);
        }
        tx.insert(workflowRecords).values(stored).run();
      } else {
        const { applicationId, createdAt: _createdAt, ...changes } = stored;
        const result = tx
          .update(workflowRecords)
          .set(changes)
          .where(and(eq(workflowRecords.applicationId, applicationId), eq(workflowRecords.version, record.version)))
          .run();
        if (result.changes === 0) {
          throw new StateConflictError(record.applicationId, record.version);
        }
      }

      if (transition) {
        tx.insert(workflowTransitions)
          .values({
            applicationId: stored.applicationId,
            generation: stored.generation,
            fromStage: transition.fromStage,
            toStage: transition.toStage,
            outcome: transition.outcome,
            detail: transition.detail,
            at: now,
          })
          .run();
      }
    });

    return stored;
  };

  const listByStage = async (stage: WorkflowStage): Promise<WorkflowRecord[]> =>
    db
      .select()
      .from(workflowRecords)
      .where(eq(workflowRecords.stage, stage))
      .orderBy(asc(workflowRecords.createdAt))
      .all()
      .map(toRecord);

  const listAll = async (): Promise<WorkflowRecord[]> =>
    db.select().from(workflowRecords).orderBy(asc(workflowRecords.createdAt)).all().map(toRecord);

  const listTransitions = async (applicationId: string): Promise<TransitionLog[]> =>
    db
      .select()
      .from(workflowTransitions)
      .where(eq(workflowTransitions.applicationId, applicationId))
      .orderBy(asc(workflowTransitions.id))
      .all();

  return { get, upsert, listByStage, listAll, listTransitions };
};
