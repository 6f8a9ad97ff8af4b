import { Module } from "@nestjs/common";
import { resolveMailSettings } from "../common/config/app-config";
import { MAIL_CAPABILITY, resolveMailCapability } from "./mail.capability";
import { MailService } from "./mail.service";

@Module({
  providers: [
    {
      provide: MAIL_CAPABILITY,
      useFactory: () => resolveMailCapability(resolveMailSettings()),
    },
    MailService,
  ],
  exports: [MailService],
})
export class MailModule {}
