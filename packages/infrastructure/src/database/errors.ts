/**
 * Duplicate-key failure from either driver: pg reports SQLSTATE 23505,
 * better-sqlite3 a SQLITE_CONSTRAINT_* code.
 */
export const isUniqueViolation = (error: unknown): boolean => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const { code } = error;
  return (
    typeof code === 'string' &&
    (code === '23505' ||
      code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
      code === 'SQLITE_CONSTRAINT_UNIQUE')
  );
};
