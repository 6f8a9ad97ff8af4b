import {
  DEFAULT_TIME_ZONE,
  DEFAULT_TRAILING_WEEKS,
  isValidTimeZone,
} from "../../core";

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.trunc(parsed);
}

export function resolveAppTimeZone(): string {
  const configured = process.env.APP_TIMEZONE?.trim();
  if (!configured) {
    return DEFAULT_TIME_ZONE;
  }
  if (!isValidTimeZone(configured)) {
    throw new Error(`APP_TIMEZONE "${configured}" is not a valid IANA time zone`);
  }
  return configured;
}

export function resolvePayrollWeeks(): number {
  return parsePositiveInt(process.env.PAYROLL_TRAILING_WEEKS, DEFAULT_TRAILING_WEEKS);
}

export function resolveDatabaseUrl(): string {
  const url = process.env.DATABASE_URL?.trim();
  if (!url) {
    throw new Error("DATABASE_URL is required");
  }
  return url;
}

export function resolveBcryptRounds(): number {
  return parsePositiveInt(process.env.BCRYPT_ROUNDS, 12);
}

const DEV_JWT_SECRET = "dev-secret";
const MIN_JWT_SECRET_LENGTH = 32;

function currentEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function resolveJwtSecret(): string {
  const secret = process.env.JWT_SECRET?.trim();
  const env = currentEnv();
  const devLike = env === "development" || env === "test";

  if (!secret) {
    if (devLike) return DEV_JWT_SECRET;
    throw new Error(`JWT_SECRET is required in ${env} mode`);
  }
  if (!devLike && secret.length < MIN_JWT_SECRET_LENGTH) {
    throw new Error(
      `JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters in ${env} mode`,
    );
  }
  return secret;
}

export interface MailSettings {
  apiKey: string | null;
  from: string | null;
  payrollReportTo: string | null;
}

function optionalEnv(name: string): string | null {
  return process.env[name]?.trim() || null;
}

export function resolveMailSettings(): MailSettings {
  return {
    apiKey: optionalEnv("SENDGRID_API_KEY"),
    from: optionalEnv("MAIL_FROM"),
    payrollReportTo: optionalEnv("PAYROLL_REPORT_TO"),
  };
}
