/**
 * Driver error classification.
 */

/** better-sqlite3 raises SqliteError with code SQLITE_CONSTRAINT_UNIQUE for UNIQUE index hits. */
export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    err.code === "SQLITE_CONSTRAINT_UNIQUE"
  );
}
