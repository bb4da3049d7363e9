import { md5Hex, sha256Hex } from "../lib/crypto.js";
import { extractEmailAddress } from "../utils/normalize.js";
import type { ApplicationEvent, Identity } from "../types/workflow.js";

const APPLICATION_HASH_LENGTH = 12;
const STUDENT_HASH_LENGTH = 8;

const receiptYear = (receivedAt: Date): number => {
  const year = receivedAt.getUTCFullYear();
  return Number.isNaN(year) ? 1970 : year;
};

export const studentIdFor = (normalizedSender: string): string =>
  `STU_${md5Hex(normalizedSender).slice(0, STUDENT_HASH_LENGTH).toUpperCase()}`;

export const applicationIdFor = (year: number, key: string): string =>
  `APP_${year}_${sha256Hex(`${year}:${key}`).slice(0, APPLICATION_HASH_LENGTH).toUpperCase()}`;

/** Dedup hash stamped on events by the poller. */
export const computeContentHash = (sender: string, subject: string, receivedAt: Date): string =>
  sha256Hex(`${sender}${subject}${receivedAt.toISOString()}`).slice(0, 16);

const rawEventHash = (event: ApplicationEvent): string => {
  if (event.contentHash) {
    return event.contentHash;
  }
  const receivedAt = Number.isNaN(event.receivedAt.getTime()) ? "" : event.receivedAt.toISOString();
  return sha256Hex(
    [
      event.sender,
      event.subject,
      event.bodyText,
      event.attachments.map((attachment) => attachment.filename).join(","),
      receivedAt,
    ].join("\n"),
  );
};

/**
 * Same normalized sender and receipt year always give the same ids.
 * Senders without a usable address fall back to a hash of the event content.
 */
export const deriveIdentity = (event: ApplicationEvent): Identity => {
  const year = receiptYear(event.receivedAt);
  const normalizedSender = extractEmailAddress(event.sender);

  if (normalizedSender) {
    return {
      applicationId: applicationIdFor(year, normalizedSender),
      studentId: studentIdFor(normalizedSender),
      normalizedSender,
      fallback: false,
    };
  }

  const key = `unknown:${rawEventHash(event)}`;
  return {
    applicationId: applicationIdFor(year, key),
    studentId: studentIdFor(key),
    normalizedSender: "",
    fallback: true,
  };
};
