import { Body, Controller, Get, Post, Query, UseGuards } from "@nestjs/common";
import { CurrentUser } from "../common/decorators/current-user.decorator";
import { JwtAuthGuard } from "../common/guards/jwt-auth.guard";
import { AuthUser } from "../common/interfaces/auth-user.interface";
import { ClockDto } from "./dto/clock.dto";
import { ListMyShiftsDto } from "./dto/list-my-shifts.dto";
import { TimeclockService } from "./timeclock.service";

@Controller("timeclock")
@UseGuards(JwtAuthGuard)
export class TimeclockController {
  constructor(private readonly timeclockService: TimeclockService) {}

  @Post("in")
  async clockIn(@CurrentUser() actor: AuthUser, @Body() dto: ClockDto) {
    return this.timeclockService.clockIn(actor, dto);
  }

  @Post("out")
  async clockOut(@CurrentUser() actor: AuthUser, @Body() dto: ClockDto) {
    return this.timeclockService.clockOut(actor, dto);
  }

  @Get("me")
  async myShifts(@CurrentUser() actor: AuthUser, @Query() query: ListMyShiftsDto) {
    return this.timeclockService.listMyShifts(actor.sub, query.limit);
  }
}
