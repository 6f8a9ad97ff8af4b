import { Module } from "@nestjs/common";
import { MailModule } from "../mail/mail.module";
import { PayrollModule } from "../payroll/payroll.module";
import { JobsController } from "./jobs.controller";
import { JobsService } from "./jobs.service";

@Module({
  imports: [PayrollModule, MailModule],
  controllers: [JobsController],
  providers: [JobsService],
  exports: [JobsService],
})
export class JobsModule {}
