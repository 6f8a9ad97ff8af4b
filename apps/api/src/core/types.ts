export interface StaffMember {
  id: string;
  username: string;
}

export interface ShiftRecord {
  id: string;
  staffId: string;
  clockIn: Date;
  clockOut: Date | null; // null while the shift is still open
}

export interface WeeklyRollup {
  staffId: string;
  weekStart: string; // YYYY-MM-DD
  weekEnd: string; // YYYY-MM-DD, inclusive
  totalHours: number;
  overtime: boolean;
}

export interface MonthlyRollup {
  staffId: string;
  month: string; // YYYY-MM
  totalHours: number;
}

export interface WeeklyRollupOptions {
  referenceDate?: string; // YYYY-MM-DD, defaults to today in timeZone
  weeks?: number;
  timeZone?: string;
}

export interface MonthlyRollupOptions {
  timeZone?: string;
}

export type PayrollReportOptions = WeeklyRollupOptions;

export interface ShiftDetailRow {
  shiftId: string;
  staffId: string;
  staffName: string;
  clockIn: string; // YYYY-MM-DD HH:mm
  clockOut: string | null;
  durationHours: number | null;
}

export interface WeeklyRollupRow extends WeeklyRollup {
  staffName: string;
}

export interface MonthlyRollupRow extends MonthlyRollup {
  staffName: string;
}

export interface PayrollReport {
  referenceDate: string;
  timeZone: string;
  weeks: number;
  shifts: ShiftDetailRow[];
  weekly: WeeklyRollupRow[];
  monthly: MonthlyRollupRow[];
}
