import { Controller, Get, Query, Res, UseGuards } from "@nestjs/common";
import { Response } from "express";
import { Roles } from "../common/decorators/roles.decorator";
import { JwtAuthGuard } from "../common/guards/jwt-auth.guard";
import { RolesGuard } from "../common/guards/roles.guard";
import { PayrollReportQueryDto } from "./dto/payroll-report-query.dto";
import { PayrollService, RenderedExport } from "./payroll.service";

function sendAttachment(res: Response, rendered: RenderedExport): void {
  res.setHeader("Content-Type", rendered.contentType);
  res.setHeader(
    "Content-Disposition",
    `attachment; filename="${rendered.filename}"`,
  );
  res.send(rendered.body);
}

@Controller("admin/payroll")
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles("SUPERADMIN")
export class PayrollController {
  constructor(private readonly payrollService: PayrollService) {}

  @Get("report")
  async getReport(@Query() query: PayrollReportQueryDto) {
    return this.payrollService.getReport(query);
  }

  @Get("export.csv")
  async exportCsv(@Query() query: PayrollReportQueryDto, @Res() res: Response) {
    sendAttachment(res, await this.payrollService.exportCsv(query));
  }

  @Get("export.xlsx")
  async exportWorkbook(
    @Query() query: PayrollReportQueryDto,
    @Res() res: Response,
  ) {
    sendAttachment(res, await this.payrollService.exportWorkbook(query));
  }
}
