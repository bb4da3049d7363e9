import { asc, eq } from "drizzle-orm";
import { google, type gmail_v1 } from "googleapis";
import { config, hasGoogleConfig } from "../config.js";
import type { AppDatabase } from "../db/client.js";
import { mailboxAccounts, type MailboxAccount } from "../db/schema.js";
import { decrypt, encrypt } from "../lib/crypto.js";
import { logger } from "../lib/logger.js";

const SCOPES = [
  "https://www.googleapis.com/auth/gmail.readonly",
  "https://www.googleapis.com/auth/gmail.send",
  "https://www.googleapis.com/auth/userinfo.email",
];

const LIST_PAGE_SIZE = 100;

export interface MailboxService {
  getAuthUrl(state?: string): string;
  handleOAuthCallback(code: string): Promise<MailboxAccount>;
  getActiveAccount(): Promise<MailboxAccount | undefined>;
  listMessageIds(account: MailboxAccount, query: string): Promise<string[]>;
  getMessage(account: MailboxAccount, id: string): Promise<gmail_v1.Schema$Message | undefined>;
  getAttachment(account: MailboxAccount, messageId: string, attachmentId: string): Promise<Buffer>;
  sendRawEmail(account: MailboxAccount, to: string, subject: string, textBody: string): Promise<void>;
  updateCheckpoint(accountId: number, polledAt: Date): Promise<void>;
}

const createOAuth2Client = () => {
  if (!hasGoogleConfig) {
    throw new Error("Google OAuth is not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET.");
  }

  return new google.auth.OAuth2(config.GOOGLE_CLIENT_ID, config.GOOGLE_CLIENT_SECRET, config.GOOGLE_REDIRECT_URI);
};

const encryptToken = (token: string | null | undefined): string | null => {
  if (!token) {
    return null;
  }
  return encrypt(token, config.ENCRYPTION_KEY);
};

const decryptToken = (token: string | null | undefined): string | undefined => {
  if (!token) {
    return undefined;
  }
  return decrypt(token, config.ENCRYPTION_KEY);
};

const decodeBase64Url = (value: string): Buffer => Buffer.from(value, "base64url");

export const encodeRawMessage = (from: string, to: string, subject: string, textBody: string): string => {
  const message = [
    `From: ${from}`,
    `To: ${to}`,
    "Content-Type: text/plain; charset=UTF-8",
    "MIME-Version: 1.0",
    `Subject: ${subject}`,
    "",
    textBody,
  ].join("\r\n");

  return Buffer.from(message).toString("base64url");
};

export const createMailboxService = (db: AppDatabase): MailboxService => {
  const getAuthUrl = (state?: string): string =>
    createOAuth2Client().generateAuthUrl({
      access_type: "offline",
      prompt: "consent select_account",
      scope: SCOPES,
      state,
    });

  const handleOAuthCallback = async (code: string): Promise<MailboxAccount> => {
    const oauth2Client = createOAuth2Client();
    const tokenResponse = await oauth2Client.getToken(code);
    oauth2Client.setCredentials(tokenResponse.tokens);

    const gmail = google.gmail({ version: "v1", auth: oauth2Client });
    const profile = await gmail.users.getProfile({ userId: "me" });
    const email = profile.data.emailAddress?.toLowerCase();

    if (!email) {
      throw new Error("Unable to resolve connected Gmail account");
    }
    if (config.MAILBOX_ADDRESS && email !== config.MAILBOX_ADDRESS.toLowerCase()) {
      throw new Error(`Connected account ${email} is not the configured intake mailbox`);
    }

    const existing = db.select().from(mailboxAccounts).where(eq(mailboxAccounts.email, email)).get();
    const refreshToken = encryptToken(tokenResponse.tokens.refresh_token) ?? existing?.refreshToken;
    if (!refreshToken) {
      throw new Error("Google did not return a refresh token. Revoke app access and reconnect.");
    }

    const now = new Date().toISOString();
    const tokenExpiry = tokenResponse.tokens.expiry_date
      ? new Date(tokenResponse.tokens.expiry_date).toISOString()
      : null;
    const [account] = db
      .insert(mailboxAccounts)
      .values({
        email,
        accessToken: encryptToken(tokenResponse.tokens.access_token),
        refreshToken,
        tokenExpiry,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: mailboxAccounts.email,
        set: {
          accessToken: encryptToken(tokenResponse.tokens.access_token),
          refreshToken,
          tokenExpiry,
          updatedAt: now,
        },
      })
      .returning()
      .all();

    if (!account) {
      throw new Error(`Failed to store mailbox account ${email}`);
    }
    logger.info("Connected Gmail mailbox", { email });
    return account;
  };

  const getActiveAccount = async (): Promise<MailboxAccount | undefined> => {
    if (config.MAILBOX_ADDRESS) {
      return db
        .select()
        .from(mailboxAccounts)
        .where(eq(mailboxAccounts.email, config.MAILBOX_ADDRESS.toLowerCase()))
        .get();
    }
    return db.select().from(mailboxAccounts).orderBy(asc(mailboxAccounts.createdAt)).limit(1).get();
  };

  const getGmailClient = (account: MailboxAccount): gmail_v1.Gmail => {
    const oauth2Client = createOAuth2Client();
    oauth2Client.setCredentials({
      access_token: decryptToken(account.accessToken),
      refresh_token: decryptToken(account.refreshToken),
      expiry_date: account.tokenExpiry ? new Date(account.tokenExpiry).getTime() : undefined,
    });
    return google.gmail({ version: "v1", auth: oauth2Client });
  };

  const listMessageIds = async (account: MailboxAccount, query: string): Promise<string[]> => {
    const gmail = getGmailClient(account);
    const ids = new Set<string>();
    let pageToken: string | undefined;

    do {
      const listResponse = await gmail.users.messages.list({
        userId: "me",
        labelIds: ["INBOX"],
        q: query,
        maxResults: LIST_PAGE_SIZE,
        pageToken,
      });
      for (const message of listResponse.data.messages ?? []) {
        if (message.id) {
          ids.add(message.id);
        }
      }
      pageToken = listResponse.data.nextPageToken ?? undefined;
    } while (pageToken);

    return Array.from(ids);
  };

  const getMessage = async (
    account: MailboxAccount,
    id: string,
  ): Promise<gmail_v1.Schema$Message | undefined> => {
    const response = await getGmailClient(account).users.messages.get({ userId: "me", id, format: "full" });
    return response.data.id ? response.data : undefined;
  };

  const getAttachment = async (account: MailboxAccount, messageId: string, attachmentId: string): Promise<Buffer> => {
    const response = await getGmailClient(account).users.messages.attachments.get({
      userId: "me",
      messageId,
      id: attachmentId,
    });
    if (!response.data.data) {
      throw new Error(`Attachment ${attachmentId} of message ${messageId} has no data`);
    }
    return decodeBase64Url(response.data.data);
  };

  const sendRawEmail = async (account: MailboxAccount, to: string, subject: string, textBody: string): Promise<void> => {
    await getGmailClient(account).users.messages.send({
      userId: "me",
      requestBody: {
        raw: encodeRawMessage(account.email, to, subject, textBody),
      },
    });
  };

  const updateCheckpoint = async (accountId: number, polledAt: Date): Promise<void> => {
    db.update(mailboxAccounts)
      .set({ lastPolledAt: polledAt.toISOString(), updatedAt: new Date().toISOString() })
      .where(eq(mailboxAccounts.id, accountId))
      .run();
  };

  return {
    getAuthUrl,
    handleOAuthCallback,
    getActiveAccount,
    listMessageIds,
    getMessage,
    getAttachment,
    sendRawEmail,
    updateCheckpoint,
  };
};
