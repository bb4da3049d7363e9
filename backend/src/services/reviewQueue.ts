import { and, asc, desc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db/client.js";
import { reviewEntries, type ReviewEntryRow } from "../db/schema.js";
import { Mutex } from "../lib/concurrency.js";
import { logger } from "../lib/logger.js";
import type { ReviewEntry } from "../types/workflow.js";

export interface AppendResult {
  entry: ReviewEntry;
  created: boolean;
}

export interface ReviewQueue {
  /** Idempotent for an existing `(applicationId, generation)`. */
  append(entry: ReviewEntry): Promise<AppendResult>;
  listAll(): Promise<ReviewEntry[]>;
  /** Most recent entry for the student. */
  find(studentId: string): Promise<ReviewEntry | undefined>;
}

const toEntry = ({ id: _id, ...entry }: ReviewEntryRow): ReviewEntry => entry;

export const createReviewQueue = (db: AppDatabase): ReviewQueue => {
  const writer = new Mutex();

  const append = (entry: ReviewEntry): Promise<AppendResult> =>
    writer.runExclusive(() => {
      const existing = db
        .select()
        .from(reviewEntries)
        .where(and(eq(reviewEntries.applicationId, entry.applicationId), eq(reviewEntries.generation, entry.generation)))
        .get();
      if (existing) {
        logger.debug("Review entry already present", {
          applicationId: entry.applicationId,
          generation: entry.generation,
        });
        return { entry: toEntry(existing), created: false };
      }

      db.insert(reviewEntries).values(entry).run();
      logger.info("Application admitted to review queue", {
        applicationId: entry.applicationId,
        studentId: entry.studentId,
      });
      return { entry, created: true };
    });

  const listAll = async (): Promise<ReviewEntry[]> =>
    db.select().from(reviewEntries).orderBy(asc(reviewEntries.id)).all().map(toEntry);

  const find = async (studentId: string): Promise<ReviewEntry | undefined> => {
    const row = db
      .select()
      .from(reviewEntries)
      .where(eq(reviewEntries.studentId, studentId))
      .orderBy(desc(reviewEntries.id))
      .limit(1)
      .get();
    return row ? toEntry(row) : undefined;
  };

  return { append, listAll, find };
};
