import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db/client.js";
import { applications, students, type ApplicationRow, type StudentRow } from "../db/schema.js";
import { CollaboratorError } from "../lib/errors.js";
import type { ApplicationStatus } from "../types/workflow.js";

export interface RegisterApplicationInput {
  studentId: string;
  email: string;
  name: string;
  applicationId: string;
  subject: string;
  attachmentCount: number;
  status: ApplicationStatus;
  infoRequiredDeadline: string | null;
}

export interface StructuredStore {
  registerApplication(input: RegisterApplicationInput): Promise<ApplicationRow>;
  getStudent(studentId: string): Promise<StudentRow | undefined>;
  getApplication(applicationId: string): Promise<ApplicationRow | undefined>;
  updateApplicationStatus(applicationId: string, status: ApplicationStatus): Promise<ApplicationRow>;
  listApplicationsByStatus(status: ApplicationStatus): Promise<ApplicationRow[]>;
}

export const createStudentDirectory = (db: AppDatabase): StructuredStore => {
  const registerApplication = async (input: RegisterApplicationInput): Promise<ApplicationRow> => {
    const now = new Date().toISOString();

    const [row] = db.transaction((tx) => {
      tx.insert(students)
        .values({ studentId: input.studentId, email: input.email, name: input.name, createdAt: now, updatedAt: now })
        .onConflictDoUpdate({
          target: students.studentId,
          set: input.name ? { name: input.name, updatedAt: now } : { updatedAt: now },
        })
        .run();

      return tx
        .insert(applications)
        .values({
          applicationId: input.applicationId,
          studentId: input.studentId,
          subject: input.subject,
          status: input.status,
          attachmentCount: input.attachmentCount,
          infoRequiredDeadline: input.infoRequiredDeadline,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoUpdate({
          target: applications.applicationId,
          set: {
            subject: input.subject,
            status: input.status,
            attachmentCount: input.attachmentCount,
            infoRequiredDeadline: input.infoRequiredDeadline,
            updatedAt: now,
          },
        })
        .returning()
        .all();
    });
    if (!row) {
      throw new CollaboratorError("structuredStore", `Application ${input.applicationId} could not be registered`);
    }
    return row;
  };

  const getStudent = async (studentId: string): Promise<StudentRow | undefined> =>
    db.select().from(students).where(eq(students.studentId, studentId)).get();

  const getApplication = async (applicationId: string): Promise<ApplicationRow | undefined> =>
    db.select().from(applications).where(eq(applications.applicationId, applicationId)).get();

  const updateApplicationStatus = async (
    applicationId: string,
    status: ApplicationStatus,
  ): Promise<ApplicationRow> => {
    const [updated] = db
      .update(applications)
      .set({ status, updatedAt: new Date().toISOString() })
      .where(eq(applications.applicationId, applicationId))
      .returning()
      .all();
    if (!updated) {
      throw new CollaboratorError("structuredStore", `Application ${applicationId} is not registered`, 404);
    }
    return updated;
  };

  const listApplicationsByStatus = async (status: ApplicationStatus): Promise<ApplicationRow[]> =>
    db.select().from(applications).where(eq(applications.status, status)).orderBy(asc(applications.createdAt)).all();

  return { registerApplication, getStudent, getApplication, updateApplicationStatus, listApplicationsByStatus };
};
