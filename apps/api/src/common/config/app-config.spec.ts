import {
  parsePositiveInt,
  resolveAppTimeZone,
  resolveJwtSecret,
  resolvePayrollWeeks,
} from "./app-config";

describe("app config", () => {
  const original = { ...process.env };

  afterEach(() => {
    process.env = { ...original };
  });

  it("falls back when a number is missing or not positive", () => {
    expect(parsePositiveInt(undefined, 8)).toBe(8);
    expect(parsePositiveInt("0", 8)).toBe(8);
    expect(parsePositiveInt("abc", 8)).toBe(8);
    expect(parsePositiveInt("12.7", 8)).toBe(12);
  });

  it("defaults the time zone to UTC", () => {
    delete process.env.APP_TIMEZONE;
    expect(resolveAppTimeZone()).toBe("UTC");
  });

  it("rejects an unknown time zone", () => {
    process.env.APP_TIMEZONE = "Mars/Olympus_Mons";
    expect(() => resolveAppTimeZone()).toThrow(
      'APP_TIMEZONE "Mars/Olympus_Mons" is not a valid IANA time zone',
    );
  });

  it("reads the trailing week count", () => {
    process.env.PAYROLL_TRAILING_WEEKS = "6";
    expect(resolvePayrollWeeks()).toBe(6);
    delete process.env.PAYROLL_TRAILING_WEEKS;
    expect(resolvePayrollWeeks()).toBe(4);
  });
});

describe("resolveJwtSecret", () => {
  const original = { ...process.env };

  afterEach(() => {
    process.env = { ...original };
  });

  it("falls back to a development secret outside production", () => {
    delete process.env.JWT_SECRET;
    process.env.NODE_ENV = "test";
    expect(resolveJwtSecret()).toBe("dev-secret");
  });

  it("requires a long secret in production", () => {
    process.env.NODE_ENV = "production";
    process.env.JWT_SECRET = "test-secret";
    expect(() => resolveJwtSecret()).toThrow(
      "JWT_SECRET must be at least 32 characters in production mode",
    );
    delete process.env.JWT_SECRET;
    expect(() => resolveJwtSecret()).toThrow("JWT_SECRET is required in production mode");
  });
});
