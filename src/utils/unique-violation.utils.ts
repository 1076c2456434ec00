import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION_CODES = ['ER_DUP_ENTRY', 'SQLITE_CONSTRAINT_UNIQUE', '23505'];

/** True when a write failed on a unique index (MySQL, SQLite or Postgres driver codes). */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;

  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.includes(driverError.code)
  );
}
