import { ShiftIntegrityError } from './errors';
import {
  MonthlyRollup,
  MonthlyRollupOptions,
  PayrollReport,
  PayrollReportOptions,
  ShiftDetailRow,
  ShiftRecord,
  StaffMember,
  WeeklyRollup,
  WeeklyRollupOptions
} from './types';
import {
  addDaysToLocalDate,
  formatDateInZone,
  formatDateTimeInZone,
  formatMonthInZone,
  isLocalDate
} from './time';

export const OVERTIME_THRESHOLD_HOURS = 40;
export const DEFAULT_TRAILING_WEEKS = 4;
export const DEFAULT_TIME_ZONE = 'UTC';

const MS_PER_HOUR = 60 * 60 * 1000;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function assertShiftOrdering(shift: ShiftRecord): void {
  if (Number.isNaN(shift.clockIn.getTime())) {
    throw new ShiftIntegrityError(shift, 'clock-in is not a valid timestamp');
  }
  if (shift.clockOut === null) {
    return;
  }
  if (Number.isNaN(shift.clockOut.getTime())) {
    throw new ShiftIntegrityError(shift, 'clock-out is not a valid timestamp');
  }
  if (shift.clockOut.getTime() < shift.clockIn.getTime()) {
    throw new ShiftIntegrityError(shift, 'clock-out precedes clock-in');
  }
}

export function computeShiftDuration(shift: ShiftRecord): number | null {
  assertShiftOrdering(shift);
  if (shift.clockOut === null) {
    return null;
  }
  return round2((shift.clockOut.getTime() - shift.clockIn.getTime()) / MS_PER_HOUR);
}

interface CompletedShift {
  localDate: string;
  month: string;
  hours: number;
}

function completedShiftsOf(
  staff: StaffMember,
  shifts: readonly ShiftRecord[],
  timeZone: string
): CompletedShift[] {
  const completed: CompletedShift[] = [];
  for (const shift of shifts) {
    if (shift.staffId !== staff.id) continue;
    const hours = computeShiftDuration(shift);
    if (hours === null) continue;

    completed.push({
      localDate: formatDateInZone(shift.clockIn, timeZone),
      month: formatMonthInZone(shift.clockIn, timeZone),
      hours
    });
  }
  return completed;
}

function resolveWeeks(weeks: number | undefined): number {
  const resolved = weeks ?? DEFAULT_TRAILING_WEEKS;
  if (!Number.isInteger(resolved) || resolved < 0) {
    throw new RangeError(`weeks must be a non-negative integer, got ${resolved}`);
  }
  return resolved;
}

function resolveReferenceDate(referenceDate: string | undefined, timeZone: string): string {
  if (referenceDate === undefined) {
    return formatDateInZone(new Date(), timeZone);
  }
  if (!isLocalDate(referenceDate)) {
    throw new Error(`Invalid reference date: ${referenceDate}`);
  }
  return referenceDate;
}

/**
 * Trailing weekly totals for one staff member, most recent week first.
 *
 * Week `w` ends `7 * w` days before the reference date and spans seven local
 * dates inclusive. Every week in the window yields a row, including weeks
 * without any completed shift. Open shifts never count.
 */
export function computeWeeklyRollups(
  staff: StaffMember,
  shifts: readonly ShiftRecord[],
  options: WeeklyRollupOptions = {}
): WeeklyRollup[] {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const weeks = resolveWeeks(options.weeks);
  const referenceDate = resolveReferenceDate(options.referenceDate, timeZone);
  const completed = completedShiftsOf(staff, shifts, timeZone);

  const rollups: WeeklyRollup[] = [];
  for (let week = 0; week < weeks; week++) {
    const weekEnd = addDaysToLocalDate(referenceDate, -7 * week);
    const weekStart = addDaysToLocalDate(weekEnd, -6);

    const totalHours = round2(
      completed
        .filter((s) => s.localDate >= weekStart && s.localDate <= weekEnd)
        .reduce((sum, s) => sum + s.hours, 0)
    );

    rollups.push({
      staffId: staff.id,
      weekStart,
      weekEnd,
      totalHours,
      overtime: totalHours > OVERTIME_THRESHOLD_HOURS
    });
  }

  return rollups;
}

/**
 * Calendar-month totals over the whole completed history, ascending by month.
 * Months without activity are not emitted.
 */
export function computeMonthlyRollups(
  staff: StaffMember,
  shifts: readonly ShiftRecord[],
  options: MonthlyRollupOptions = {}
): MonthlyRollup[] {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const totals = new Map<string, number>();

  for (const shift of completedShiftsOf(staff, shifts, timeZone)) {
    totals.set(shift.month, (totals.get(shift.month) ?? 0) + shift.hours);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, total]) => ({
      staffId: staff.id,
      month,
      totalHours: round2(total)
    }));
}

export function buildPayrollReport(
  staff: readonly StaffMember[],
  shifts: readonly ShiftRecord[],
  options: PayrollReportOptions = {}
): PayrollReport {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const weeks = resolveWeeks(options.weeks);
  const referenceDate = resolveReferenceDate(options.referenceDate, timeZone);

  shifts.forEach(assertShiftOrdering);

  const namesById = new Map(staff.map((member) => [member.id, member.username]));

  const detail: ShiftDetailRow[] = [];
  for (const shift of [...shifts].sort((a, b) => b.clockIn.getTime() - a.clockIn.getTime())) {
    const staffName = namesById.get(shift.staffId);
    if (staffName === undefined) continue;

    detail.push({
      shiftId: shift.id,
      staffId: shift.staffId,
      staffName,
      clockIn: formatDateTimeInZone(shift.clockIn, timeZone),
      clockOut: shift.clockOut ? formatDateTimeInZone(shift.clockOut, timeZone) : null,
      durationHours: computeShiftDuration(shift)
    });
  }

  const weekly = staff.flatMap((member) =>
    computeWeeklyRollups(member, shifts, { referenceDate, weeks, timeZone }).map((rollup) => ({
      ...rollup,
      staffName: member.username
    }))
  );

  const monthly = staff.flatMap((member) =>
    computeMonthlyRollups(member, shifts, { timeZone }).map((rollup) => ({
      ...rollup,
      staffName: member.username
    }))
  );

  return {
    referenceDate,
    timeZone,
    weeks,
    shifts: detail,
    weekly,
    monthly
  };
}
