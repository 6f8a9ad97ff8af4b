import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import { and, desc, eq, isNull } from "drizzle-orm";
import { computeShiftDuration } from "../core";
import { AuthUser } from "../common/interfaces/auth-user.interface";
import { DatabaseService } from "../database/database.service";
import { isUniqueViolation } from "../database/pg-errors";
import { OPEN_SHIFT_INDEX, Shift, shifts } from "../database/schema";
import { ClockDto } from "./dto/clock.dto";

export interface ShiftView {
  id: string;
  clockIn: string;
  clockOut: string | null;
  durationHours: number | null;
  note: string | null;
}

const DEFAULT_HISTORY_LIMIT = 50;

@Injectable()
export class TimeclockService {
  private readonly logger = new Logger(TimeclockService.name);

  constructor(private readonly database: DatabaseService) {}

  async clockIn(actor: AuthUser, dto: ClockDto): Promise<ShiftView> {
    const open = await this.findOpenShift(actor.sub);
    if (open) {
      throw new BadRequestException("Already clocked in");
    }

    const [created] = await this.database.db
      .insert(shifts)
      .values({
        adminId: actor.sub,
        clockIn: new Date(),
        note: dto.note ?? null,
      })
      .returning()
      .catch((error: unknown) => {
        // lost a race with a concurrent clock-in
        if (isUniqueViolation(error, OPEN_SHIFT_INDEX)) {
          throw new BadRequestException("Already clocked in");
        }
        throw error;
      });

    await this.database.recordAudit({
      actorAdminId: actor.sub,
      action: "SHIFT_CLOCK_IN",
      entityType: "Shift",
      entityId: created.id,
      payload: { clockIn: created.clockIn.toISOString() },
    });
    this.logger.log(`${actor.username} clocked in (shift ${created.id})`);

    return this.toView(created);
  }

  async clockOut(actor: AuthUser, dto: ClockDto): Promise<ShiftView> {
    const open = await this.findOpenShift(actor.sub);
    if (!open) {
      throw new NotFoundException("No active shift found");
    }

    const clockOut = new Date();
    if (clockOut.getTime() < open.clockIn.getTime()) {
      throw new BadRequestException("Clock-out would precede the shift's clock-in");
    }

    const [closed] = await this.database.db
      .update(shifts)
      .set({ clockOut, note: dto.note ?? open.note })
      .where(and(eq(shifts.id, open.id), isNull(shifts.clockOut)))
      .returning();

    if (!closed) {
      throw new ConflictException("Shift was already closed");
    }

    const view = this.toView(closed);
    await this.database.recordAudit({
      actorAdminId: actor.sub,
      action: "SHIFT_CLOCK_OUT",
      entityType: "Shift",
      entityId: closed.id,
      payload: { clockOut: clockOut.toISOString(), durationHours: view.durationHours },
    });
    this.logger.log(`${actor.username} clocked out (shift ${closed.id}, ${view.durationHours}h)`);

    return view;
  }

  async listMyShifts(actorId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<ShiftView[]> {
    const rows = await this.database.db.query.shifts.findMany({
      where: eq(shifts.adminId, actorId),
      orderBy: [desc(shifts.clockIn)],
      limit,
    });
    return rows.map((row) => this.toView(row));
  }

  private async findOpenShift(adminId: string): Promise<Shift | undefined> {
    return this.database.db.query.shifts.findFirst({
      where: and(eq(shifts.adminId, adminId), isNull(shifts.clockOut)),
    });
  }

  private toView(row: Shift): ShiftView {
    return {
      id: row.id,
      clockIn: row.clockIn.toISOString(),
      clockOut: row.clockOut ? row.clockOut.toISOString() : null,
      durationHours: computeShiftDuration({
        id: row.id,
        staffId: row.adminId,
        clockIn: row.clockIn,
        clockOut: row.clockOut,
      }),
      note: row.note,
    };
  }
}
