import { UnauthorizedException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { DatabaseService } from "../database/database.service";
import { MailService } from "../mail/mail.service";
import { PayrollService } from "../payroll/payroll.service";
import { JobsService, PAYROLL_ATTACHMENT_NAME } from "./jobs.service";

const workbookBytes = Buffer.from("test-workbook");

const mockPayrollService = {
  exportWorkbook: jest.fn(),
};

const mockMailService = {
  send: jest.fn(),
};

const mockDatabaseService = {
  recordAudit: jest.fn(),
};

describe("JobsService", () => {
  let service: JobsService;
  const originalEnv = { ...process.env };

  beforeEach(async () => {
    jest.clearAllMocks();
    process.env.JOB_SECRET = "test-secret";
    process.env.PAYROLL_REPORT_TO = "owner@example.com";

    mockPayrollService.exportWorkbook.mockResolvedValue({
      referenceDate: "2024-01-12",
      filename: "payroll-2024-01-12.xlsx",
      contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
      body: workbookBytes,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JobsService,
        { provide: PayrollService, useValue: mockPayrollService },
        { provide: MailService, useValue: mockMailService },
        { provide: DatabaseService, useValue: mockDatabaseService },
      ],
    }).compile();

    service = module.get<JobsService>(JobsService);
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("rejects a wrong job secret", async () => {
    await expect(service.runPayrollReportEmail("other-secret")).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
    expect(mockPayrollService.exportWorkbook).not.toHaveBeenCalled();
  });

  it("rejects every call while no secret is configured", async () => {
    delete process.env.JOB_SECRET;

    await expect(service.runPayrollReportEmail("test-secret")).rejects.toThrow(
      "JOB_SECRET is not configured",
    );
  });

  it("mails the workbook as an attachment", async () => {
    mockMailService.send.mockResolvedValue({ delivered: true, statusCode: 202 });

    const result = await service.runPayrollReportEmail("test-secret");

    expect(result).toEqual({
      ok: true,
      delivered: true,
      referenceDate: "2024-01-12",
      statusCode: 202,
    });
    expect(mockMailService.send).toHaveBeenCalledWith({
      to: "owner@example.com",
      subject: "Weekly Payroll Report (2024-01-12)",
      text: "Attached is the latest payroll Excel report.",
      attachments: [
        {
          filename: PAYROLL_ATTACHMENT_NAME,
          contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
          content: workbookBytes,
        },
      ],
    });
    expect(mockDatabaseService.recordAudit).toHaveBeenCalledWith(
      expect.objectContaining({ action: "PAYROLL_REPORT_EMAILED", entityId: "2024-01-12" }),
    );
  });

  it("reports an unavailable mail transport without auditing", async () => {
    mockMailService.send.mockResolvedValue({
      delivered: false,
      reason: "SENDGRID_API_KEY is not configured",
    });

    const result = await service.sendPayrollReport();

    expect(result).toEqual({
      delivered: false,
      referenceDate: "2024-01-12",
      reason: "SENDGRID_API_KEY is not configured",
    });
    expect(mockDatabaseService.recordAudit).not.toHaveBeenCalled();
  });

  it("skips the report when no recipient is configured", async () => {
    delete process.env.PAYROLL_REPORT_TO;

    const result = await service.sendPayrollReport();

    expect(result).toEqual({
      delivered: false,
      referenceDate: null,
      reason: "PAYROLL_REPORT_TO is not configured",
    });
    expect(mockPayrollService.exportWorkbook).not.toHaveBeenCalled();
  });
});
