export const DEFAULT_CORS_ORIGIN = "http://localhost:3000";

type CorsCallback = (err: Error | null, allow?: boolean) => void;

/**
 * Origin patterns from a comma separated list. `*` alone allows any origin;
 * elsewhere it matches any run of characters, e.g. `https://*.clinic.test`.
 */
export function parseCorsOrigins(raw: string | undefined): string[] {
  return (raw || DEFAULT_CORS_ORIGIN)
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function patternToRegex(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}

export function isAllowedOrigin(origin: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) =>
    pattern.includes("*") ? patternToRegex(pattern).test(origin) : pattern === origin,
  );
}

// Requests without an Origin header (curl, server to server) are let through.
export function createCorsOriginCheck(patterns: readonly string[]) {
  return (origin: string | undefined, callback: CorsCallback): void => {
    if (!origin || isAllowedOrigin(origin, patterns)) {
      callback(null, true);
      return;
    }
    callback(new Error(`Origin ${origin} is not allowed by CORS`));
  };
}
