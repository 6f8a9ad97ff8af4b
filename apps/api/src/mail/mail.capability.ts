import sgMail from "@sendgrid/mail";
import { MailSettings } from "../common/config/app-config";

export interface MailAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

export interface OutgoingMail {
  to: string;
  subject: string;
  text: string;
  attachments: MailAttachment[];
}

export interface MailClient {
  send(mail: OutgoingMail & { from: string }): Promise<{ statusCode: number }>;
}

export type MailCapability =
  | { kind: "available"; client: MailClient; from: string }
  | { kind: "unavailable"; reason: string };

export const MAIL_CAPABILITY = Symbol("MAIL_CAPABILITY");

export function createSendGridClient(apiKey: string): MailClient {
  sgMail.setApiKey(apiKey);
  return {
    async send(mail) {
      const [response] = await sgMail.send({
        to: mail.to,
        from: mail.from,
        subject: mail.subject,
        text: mail.text,
        attachments: mail.attachments.map((attachment) => ({
          content: attachment.content.toString("base64"),
          filename: attachment.filename,
          type: attachment.contentType,
          disposition: "attachment",
        })),
      });
      return { statusCode: response.statusCode };
    },
  };
}

export function resolveMailCapability(
  settings: MailSettings,
  clientFactory: (apiKey: string) => MailClient = createSendGridClient,
): MailCapability {
  if (!settings.apiKey) {
    return { kind: "unavailable", reason: "SENDGRID_API_KEY is not configured" };
  }
  if (!settings.from) {
    return { kind: "unavailable", reason: "MAIL_FROM is not configured" };
  }
  return {
    kind: "available",
    client: clientFactory(settings.apiKey),
    from: settings.from,
  };
}
