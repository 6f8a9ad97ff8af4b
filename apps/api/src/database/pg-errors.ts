export const UNIQUE_VIOLATION = "23505";

/** True for a node-postgres error raised by a unique constraint or index. */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if (!("code" in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  return (
    constraint === undefined ||
    ("constraint" in error && error.constraint === constraint)
  );
}
