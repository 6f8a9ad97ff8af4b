import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "../app.module";
import { JobsService } from "../jobs/jobs.service";

async function main(): Promise<void> {
  const logger = new Logger("SendPayrollReport");
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const result = await app.get(JobsService).sendPayrollReport();
    if (result.delivered) {
      logger.log(`Payroll report for ${result.referenceDate} sent (status ${result.statusCode})`);
    } else {
      logger.warn(`Payroll report not sent: ${result.reason}`);
    }
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
