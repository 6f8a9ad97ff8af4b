export * from "./types";
export * from "./time";
export * from "./errors";
export * from "./timesheet";
export * from "./report-export";
