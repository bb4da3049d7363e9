import { CollaboratorError, toCollaboratorError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { MailboxService } from "./mailboxService.js";
import { renderTemplate, type TemplateFieldsMap, type TemplateName } from "./templates.js";

export interface Notifier {
  sendTemplate<T extends TemplateName>(templateName: T, recipient: string, fields: TemplateFieldsMap[T]): Promise<void>;
}

export const createGmailNotifier = (mailbox: MailboxService): Notifier => ({
  sendTemplate: async <T extends TemplateName>(
    templateName: T,
    recipient: string,
    fields: TemplateFieldsMap[T],
  ): Promise<void> => {
    const account = await mailbox.getActiveAccount();
    if (!account) {
      throw new CollaboratorError("notifier", "No Gmail mailbox connected; cannot send notifications");
    }

    const rendered = renderTemplate(templateName, fields);
    try {
      await mailbox.sendRawEmail(account, recipient, rendered.subject, rendered.text);
    } catch (error) {
      throw toCollaboratorError(error, "notifier");
    }
    logger.info("Notification sent", { template: templateName, recipient, applicationId: fields.applicationId });
  },
});
