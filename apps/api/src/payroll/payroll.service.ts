import {
  BadRequestException,
  Injectable,
  Logger,
  UnprocessableEntityException,
} from "@nestjs/common";
import { asc } from "drizzle-orm";
import {
  buildPayrollReport,
  isLocalDate,
  PayrollReport,
  renderPayrollWorkbook,
  renderShiftsCsv,
  ShiftIntegrityError,
  ShiftRecord,
  StaffMember,
} from "../core";
import {
  resolveAppTimeZone,
  resolvePayrollWeeks,
} from "../common/config/app-config";
import { DatabaseService } from "../database/database.service";
import { admins } from "../database/schema";
import { PayrollReportQueryDto } from "./dto/payroll-report-query.dto";

export interface LedgerSnapshot {
  staff: StaffMember[];
  shifts: ShiftRecord[];
}

export interface RenderedExport {
  referenceDate: string;
  filename: string;
  contentType: string;
  body: Buffer;
}

export const XLSX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

@Injectable()
export class PayrollService {
  private readonly logger = new Logger(PayrollService.name);

  constructor(private readonly database: DatabaseService) {}

  /** Roster and shifts read in one read-only transaction. */
  async loadSnapshot(): Promise<LedgerSnapshot> {
    return this.database.db.transaction(
      async (tx) => {
        const staffRows = await tx.query.admins.findMany({
          columns: { id: true, username: true },
          orderBy: [asc(admins.username)],
        });
        const shiftRows = await tx.query.shifts.findMany({
          columns: { id: true, adminId: true, clockIn: true, clockOut: true },
        });

        return {
          staff: staffRows.map((row) => ({ id: row.id, username: row.username })),
          shifts: shiftRows.map((row) => ({
            id: row.id,
            staffId: row.adminId,
            clockIn: row.clockIn,
            clockOut: row.clockOut,
          })),
        };
      },
      { isolationLevel: "repeatable read", accessMode: "read only" },
    );
  }

  async getReport(query: PayrollReportQueryDto = {}): Promise<PayrollReport> {
    if (query.referenceDate !== undefined && !isLocalDate(query.referenceDate)) {
      throw new BadRequestException("referenceDate is not a calendar date");
    }

    const snapshot = await this.loadSnapshot();
    try {
      const report = buildPayrollReport(snapshot.staff, snapshot.shifts, {
        referenceDate: query.referenceDate,
        weeks: query.weeks ?? resolvePayrollWeeks(),
        timeZone: resolveAppTimeZone(),
      });
      this.logger.debug(
        `Payroll report for ${report.referenceDate}: ${report.shifts.length} shifts, ${snapshot.staff.length} staff`,
      );
      return report;
    } catch (error) {
      if (error instanceof ShiftIntegrityError) {
        this.logger.error(error.message);
        throw new UnprocessableEntityException(error.message);
      }
      throw error;
    }
  }

  async exportCsv(query: PayrollReportQueryDto = {}): Promise<RenderedExport> {
    const report = await this.getReport(query);
    return {
      referenceDate: report.referenceDate,
      filename: `payroll-${report.referenceDate}.csv`,
      contentType: "text/csv; charset=utf-8",
      body: Buffer.from(renderShiftsCsv(report), "utf8"),
    };
  }

  async exportWorkbook(
    query: PayrollReportQueryDto = {},
  ): Promise<RenderedExport> {
    const report = await this.getReport(query);
    return {
      referenceDate: report.referenceDate,
      filename: `payroll-${report.referenceDate}.xlsx`,
      contentType: XLSX_CONTENT_TYPE,
      body: await renderPayrollWorkbook(report),
    };
  }
}
