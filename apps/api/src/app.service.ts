import { Injectable } from "@nestjs/common";
import { formatDateInZone } from "./core";
import { resolveAppTimeZone } from "./common/config/app-config";

@Injectable()
export class AppService {
  getHealth(): { status: string; message: string } {
    return { status: "ok", message: "Clinic timesheets API is running" };
  }

  getTime(now = new Date()): { serverNow: string; timeZone: string; localDate: string } {
    const timeZone = resolveAppTimeZone();
    return {
      serverNow: now.toISOString(),
      timeZone,
      localDate: formatDateInZone(now, timeZone),
    };
  }
}
