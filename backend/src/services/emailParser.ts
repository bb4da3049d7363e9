import { extractDisplayName, extractEmailAddress } from "../utils/normalize.js";

interface ParsedHeader {
  name?: string | null;
  value?: string | null;
}

export interface MessagePart {
  mimeType?: string | null;
  filename?: string | null;
  headers?: ParsedHeader[] | null;
  body?: { data?: string | null; attachmentId?: string | null; size?: number | null } | null;
  parts?: MessagePart[] | null;
}

export interface AttachmentPart {
  filename: string;
  mimeType: string;
  size: number;
  attachmentId: string | null;
  // Inline data, present for small parts.
  data: string | null;
}

export interface ParsedMessage {
  fromRaw: string;
  fromEmail: string | null;
  fromDisplayName: string;
  subject: string;
  bodyText: string;
  internalDate: Date;
  rawHeaders: Record<string, string>;
  attachments: AttachmentPart[];
}

const pickHeader = (headers: ParsedHeader[] | null | undefined, key: string): string => {
  if (!headers) {
    return "";
  }
  return headers.find((header) => header.name?.toLowerCase() === key.toLowerCase())?.value ?? "";
};

const decodeBase64Url = (value: string): string => Buffer.from(value, "base64url").toString("utf8");

const stripHtml = (html: string): string =>
  html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/[ \t]+/g, " ")
    .trim();

const collectParts = (
  part: MessagePart | undefined,
): { text: string[]; html: string[]; attachments: AttachmentPart[] } => {
  if (!part) {
    return { text: [], html: [], attachments: [] };
  }

  const text: string[] = [];
  const html: string[] = [];
  const attachments: AttachmentPart[] = [];

  if (part.filename) {
    attachments.push({
      filename: part.filename,
      mimeType: part.mimeType || "application/octet-stream",
      size: part.body?.size ?? 0,
      attachmentId: part.body?.attachmentId ?? null,
      data: part.body?.data ?? null,
    });
  } else if (part.body?.data) {
    if (part.mimeType === "text/plain") {
      text.push(decodeBase64Url(part.body.data));
    }
    if (part.mimeType === "text/html") {
      html.push(decodeBase64Url(part.body.data));
    }
  }

  for (const child of part.parts ?? []) {
    const nested = collectParts(child);
    text.push(...nested.text);
    html.push(...nested.html);
    attachments.push(...nested.attachments);
  }

  return { text, html, attachments };
};

export const parseGmailMessagePayload = (payload: MessagePart, internalDate?: string | null): ParsedMessage => {
  const headers = payload.headers ?? [];
  const fromRaw = pickHeader(headers, "from");
  const subject = pickHeader(headers, "subject");

  const collected = collectParts(payload);
  const plain = collected.text.join("\n").trim();
  const bodyText = plain || stripHtml(collected.html.join("\n"));

  const headerObject = Object.fromEntries(
    headers
      .filter((header) => Boolean(header.name))
      .map((header) => [String(header.name).toLowerCase(), header.value ?? ""]),
  );

  return {
    fromRaw,
    fromEmail: extractEmailAddress(fromRaw),
    fromDisplayName: extractDisplayName(fromRaw),
    subject,
    bodyText,
    internalDate: internalDate ? new Date(Number(internalDate)) : new Date(),
    rawHeaders: headerObject,
    attachments: collected.attachments,
  };
};
