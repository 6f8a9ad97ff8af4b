import { Controller, Headers, HttpCode, Post } from "@nestjs/common";
import { JobsService } from "./jobs.service";

@Controller("internal/jobs")
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Post("payroll-report")
  @HttpCode(200)
  async runPayrollReport(@Headers("x-job-secret") secret?: string) {
    return this.jobsService.runPayrollReportEmail(secret);
  }
}
