import { Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { resolveMailSettings } from "../common/config/app-config";
import { DatabaseService } from "../database/database.service";
import { MailService } from "../mail/mail.service";
import { PayrollService } from "../payroll/payroll.service";

export const PAYROLL_ATTACHMENT_NAME = "payroll_report.xlsx";

export type PayrollEmailResult =
  | { delivered: true; referenceDate: string; statusCode: number }
  | { delivered: false; referenceDate: string | null; reason: string };

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    private readonly payrollService: PayrollService,
    private readonly mailService: MailService,
    private readonly database: DatabaseService,
  ) {}

  async runPayrollReportEmail(secret: string | undefined) {
    this.assertJobSecret(secret);
    const result = await this.sendPayrollReport();
    return { ok: true, ...result };
  }

  async sendPayrollReport(): Promise<PayrollEmailResult> {
    const recipient = resolveMailSettings().payrollReportTo;
    if (!recipient) {
      this.logger.warn("Payroll report not sent: PAYROLL_REPORT_TO is not configured");
      return {
        delivered: false,
        referenceDate: null,
        reason: "PAYROLL_REPORT_TO is not configured",
      };
    }

    const workbook = await this.payrollService.exportWorkbook();
    const { referenceDate } = workbook;

    const delivery = await this.mailService.send({
      to: recipient,
      subject: `Weekly Payroll Report (${referenceDate})`,
      text: "Attached is the latest payroll Excel report.",
      attachments: [
        {
          filename: PAYROLL_ATTACHMENT_NAME,
          contentType: workbook.contentType,
          content: workbook.body,
        },
      ],
    });

    if (!delivery.delivered) {
      return { delivered: false, referenceDate, reason: delivery.reason };
    }

    await this.database.recordAudit({
      actorAdminId: null,
      action: "PAYROLL_REPORT_EMAILED",
      entityType: "PayrollReport",
      entityId: referenceDate,
      payload: { recipient, statusCode: delivery.statusCode },
    });

    return { delivered: true, referenceDate, statusCode: delivery.statusCode };
  }

  private assertJobSecret(secret: string | undefined): void {
    const expected = process.env.JOB_SECRET;

    if (!expected) {
      throw new UnauthorizedException("JOB_SECRET is not configured");
    }

    if (!secret || secret !== expected) {
      throw new UnauthorizedException("Invalid job secret");
    }
  }
}
