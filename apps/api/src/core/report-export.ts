import { Workbook, Worksheet } from "exceljs";
import {
  MonthlyRollupRow,
  PayrollReport,
  ShiftDetailRow,
  WeeklyRollupRow,
} from "./types";

export type ReportCell = string | number;

export const SHEET_NAMES = {
  shifts: "Shifts",
  weekly: "Weekly Payroll",
  monthly: "Monthly Summary",
} as const;

export const SHIFT_HEADERS = ["Staff", "Clock In", "Clock Out", "Hours"];
export const WEEKLY_HEADERS = [
  "Staff",
  "Week Start",
  "Week End",
  "Total Hours",
  "Overtime?",
];
export const MONTHLY_HEADERS = ["Staff", "Month", "Total Hours"];

export const ACTIVE_SHIFT_LABEL = "Active";
export const MISSING_HOURS_LABEL = "-";

const HOURS_FORMAT = "0.00";

export function shiftCells(row: ShiftDetailRow): ReportCell[] {
  return [
    row.staffName,
    row.clockIn,
    row.clockOut ?? ACTIVE_SHIFT_LABEL,
    row.durationHours ?? MISSING_HOURS_LABEL,
  ];
}

export function weeklyCells(row: WeeklyRollupRow): ReportCell[] {
  return [
    row.staffName,
    row.weekStart,
    row.weekEnd,
    row.totalHours,
    row.overtime ? "YES" : "NO",
  ];
}

export function monthlyCells(row: MonthlyRollupRow): ReportCell[] {
  return [row.staffName, row.month, row.totalHours];
}

export function formatCsvCell(value: ReportCell): string {
  const text = typeof value === "number" ? value.toFixed(2) : value;
  if (!/[",\r\n]/.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

export function renderShiftsCsv(report: PayrollReport): string {
  const rows = [SHIFT_HEADERS, ...report.shifts.map(shiftCells)];
  return rows.map((row) => row.map(formatCsvCell).join(",")).join("\n");
}

function addSheet(
  workbook: Workbook,
  name: string,
  headers: string[],
  rows: ReportCell[][],
  hourColumns: number[],
): Worksheet {
  const sheet = workbook.addWorksheet(name);
  sheet.addRow(headers).font = { bold: true };
  rows.forEach((row) => sheet.addRow(row));

  headers.forEach((header, index) => {
    sheet.getColumn(index + 1).width = Math.max(12, header.length + 4);
  });
  for (const column of hourColumns) {
    sheet.getColumn(column).numFmt = HOURS_FORMAT;
  }
  return sheet;
}

export function buildPayrollWorkbook(report: PayrollReport): Workbook {
  const workbook = new Workbook();
  workbook.created = new Date();

  addSheet(
    workbook,
    SHEET_NAMES.shifts,
    SHIFT_HEADERS,
    report.shifts.map(shiftCells),
    [4],
  );
  addSheet(
    workbook,
    SHEET_NAMES.weekly,
    WEEKLY_HEADERS,
    report.weekly.map(weeklyCells),
    [4],
  );
  addSheet(
    workbook,
    SHEET_NAMES.monthly,
    MONTHLY_HEADERS,
    report.monthly.map(monthlyCells),
    [3],
  );

  return workbook;
}

export async function renderPayrollWorkbook(
  report: PayrollReport,
): Promise<Buffer> {
  const data = await buildPayrollWorkbook(report).xlsx.writeBuffer();
  return Buffer.from(data);
}
