import { QueryFailedError } from 'typeorm';
import { ConstraintViolation, DomainError, StoreUnavailable, ValidationError } from '@/domain/errors';

const UNIQUE_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY', '23505']);
const NOT_NULL_CODES = new Set(['SQLITE_CONSTRAINT_NOTNULL', '23502']);
const CHECK_CODES = new Set(['SQLITE_CONSTRAINT_CHECK', '23514']);

function driverCode(error: QueryFailedError): string | undefined {
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

/** Extracts the column from "UNIQUE constraint failed: users.email" style messages. */
function failedColumn(message: string): string {
  const qualified = message.match(/constraint failed: "?\w+"?\."?(\w+)"?/i);
  if (qualified) {
    return qualified[1];
  }
  const bare = message.match(/constraint failed: "?(\w+)"?/i);
  return bare ? bare[1] : 'unknown';
}

/**
 * Maps a driver failure onto the domain error taxonomy.
 * Unique → ConstraintViolation, NOT NULL / CHECK → ValidationError, anything else → StoreUnavailable.
 */
export function translateStoreError(error: unknown, operation: string): DomainError {
  if (error instanceof DomainError) {
    return error;
  }

  if (error instanceof QueryFailedError) {
    const code = driverCode(error) ?? '';
    const column = failedColumn(error.message);

    if (UNIQUE_CODES.has(code)) {
      return new ConstraintViolation(column, `'${column}' must be unique`, { cause: error });
    }
    if (NOT_NULL_CODES.has(code)) {
      return new ValidationError(column, null, `'${column}' is required`);
    }
    if (CHECK_CODES.has(code)) {
      return new ValidationError(column, undefined, `'${column}' is outside its allowed values`);
    }
  }

  return new StoreUnavailable(operation, error);
}

/** Runs a storage call and rethrows its failure as a domain error. */
export async function withStoreErrors<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw translateStoreError(error, operation);
  }
}
