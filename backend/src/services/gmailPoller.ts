import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import dayjs from "dayjs";
import type { MailboxAccount } from "../db/schema.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ApplicationEvent, Attachment, FollowupKind } from "../types/workflow.js";
import { safeFilename } from "../utils/normalize.js";
import { detectApplicationEmail, type MessageKind } from "./applicationDetector.js";
import { parseGmailMessagePayload, type AttachmentPart, type ParsedMessage } from "./emailParser.js";
import { computeContentHash, studentIdFor } from "./identity.js";
import type { MailboxService } from "./mailboxService.js";
import type { StructuredStore } from "./studentDirectory.js";

export interface Poller {
  fetchBatch(): Promise<ApplicationEvent[]>;
  fetchFollowup(kind: FollowupKind): Promise<ApplicationEvent[]>;
}

export interface GmailPollerOptions {
  mailbox: MailboxService;
  directory: StructuredStore;
  attachmentDir: string;
  keywords: string[];
  lookbackDays: number;
}

const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export const buildApplicationQuery = (keywords: string[], since: Date): string => {
  const terms = keywords.map((keyword) => (keyword.includes(" ") ? `"${keyword}"` : keyword));
  const keywordClause = terms.length > 0 ? ` (${terms.join(" OR ")})` : "";
  return `after:${toUnixSeconds(since)}${keywordClause}`;
};

export const buildFollowupQuery = (studentEmail: string, since: Date): string =>
  `from:${studentEmail} after:${toUnixSeconds(since)}`;

export const createGmailPoller = (options: GmailPollerOptions): Poller => {
  const { mailbox, directory } = options;

  const downloadAttachment = async (
    account: MailboxAccount,
    messageId: string,
    part: AttachmentPart,
  ): Promise<Attachment> => {
    const bytes = part.data
      ? Buffer.from(part.data, "base64url")
      : part.attachmentId
        ? await mailbox.getAttachment(account, messageId, part.attachmentId)
        : Buffer.alloc(0);

    const directoryPath = path.resolve(options.attachmentDir, messageId);
    await mkdir(directoryPath, { recursive: true });
    const location = path.join(directoryPath, safeFilename(part.filename));
    await writeFile(location, bytes);

    return { filename: part.filename, contentType: part.mimeType, size: bytes.length, location };
  };

  const toEvent = async (
    account: MailboxAccount,
    messageId: string,
    parsed: ParsedMessage,
  ): Promise<ApplicationEvent> => {
    const attachments: Attachment[] = [];
    for (const part of parsed.attachments) {
      try {
        attachments.push(await downloadAttachment(account, messageId, part));
      } catch (error) {
        logger.warn("Failed to download attachment", {
          messageId,
          filename: part.filename,
          error: errorMessage(error),
        });
      }
    }

    return {
      eventId: `gmail:${messageId}`,
      sender: parsed.fromRaw,
      senderName: parsed.fromDisplayName,
      subject: parsed.subject,
      bodyText: parsed.bodyText,
      attachments,
      receivedAt: parsed.internalDate,
      contentHash: computeContentHash(parsed.fromEmail ?? parsed.fromRaw, parsed.subject, parsed.internalDate),
    };
  };

  const collect = async (account: MailboxAccount, query: string, wanted: MessageKind): Promise<ApplicationEvent[]> => {
    const ids = await mailbox.listMessageIds(account, query);
    const events: ApplicationEvent[] = [];

    for (const id of ids) {
      try {
        const message = await mailbox.getMessage(account, id);
        if (!message?.payload) {
          continue;
        }
        const parsed = parseGmailMessagePayload(message.payload, message.internalDate);
        const knownStudent = parsed.fromEmail
          ? (await directory.getStudent(studentIdFor(parsed.fromEmail))) !== undefined
          : false;
        const detection = detectApplicationEmail(parsed.subject, parsed.bodyText, {
          hasAttachments: parsed.attachments.length > 0,
          knownStudent,
          keywords: options.keywords,
        });
        if (detection.kind !== wanted) {
          logger.debug("Skipping message", { messageId: id, kind: detection.kind, rule: detection.matchedRule });
          continue;
        }
        events.push(await toEvent(account, id, parsed));
      } catch (error) {
        logger.warn("Failed to fetch Gmail message", { messageId: id, error: errorMessage(error) });
      }
    }

    return events;
  };

  const fetchBatch = async (): Promise<ApplicationEvent[]> => {
    const account = await mailbox.getActiveAccount();
    if (!account) {
      logger.warn("No Gmail mailbox connected; skipping poll");
      return [];
    }

    const startedAt = new Date();
    const since = account.lastPolledAt
      ? new Date(account.lastPolledAt)
      : dayjs(startedAt).subtract(options.lookbackDays, "day").toDate();
    const events = await collect(account, buildApplicationQuery(options.keywords, since), "application");
    await mailbox.updateCheckpoint(account.id, startedAt);

    logger.info("Mailbox poll finished", { account: account.email, since: since.toISOString(), events: events.length });
    return events;
  };

  const fetchFollowup = async (kind: FollowupKind): Promise<ApplicationEvent[]> => {
    const account = await mailbox.getActiveAccount();
    if (!account) {
      logger.warn("No Gmail mailbox connected; skipping follow-up poll", { kind });
      return [];
    }

    const pending = [
      ...(await directory.listApplicationsByStatus("information_required")),
      ...(await directory.listApplicationsByStatus("validation_failed")),
    ];
    const events: ApplicationEvent[] = [];

    for (const application of pending) {
      const student = await directory.getStudent(application.studentId);
      if (!student) {
        continue;
      }
      const query = buildFollowupQuery(student.email, new Date(application.updatedAt));
      events.push(...(await collect(account, query, "information_required_response")));
    }

    logger.info("Follow-up poll finished", { kind, applications: pending.length, events: events.length });
    return events;
  };

  return { fetchBatch, fetchFollowup };
};
