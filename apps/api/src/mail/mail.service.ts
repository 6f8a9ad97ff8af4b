import {
  BadGatewayException,
  Inject,
  Injectable,
  Logger,
} from "@nestjs/common";
import { MAIL_CAPABILITY, MailCapability, OutgoingMail } from "./mail.capability";

export type DeliveryResult =
  | { delivered: true; statusCode: number }
  | { delivered: false; reason: string };

@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);

  constructor(
    @Inject(MAIL_CAPABILITY) private readonly capability: MailCapability,
  ) {}

  async send(mail: OutgoingMail): Promise<DeliveryResult> {
    if (this.capability.kind === "unavailable") {
      this.logger.warn(`Mail to ${mail.to} skipped: ${this.capability.reason}`);
      return { delivered: false, reason: this.capability.reason };
    }

    try {
      const { statusCode } = await this.capability.client.send({
        ...mail,
        from: this.capability.from,
      });
      this.logger.log(`Mail "${mail.subject}" sent to ${mail.to} (status ${statusCode})`);
      return { delivered: true, statusCode };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Mail "${mail.subject}" to ${mail.to} failed: ${message}`);
      throw new BadGatewayException("Mail provider rejected the message");
    }
  }
}
