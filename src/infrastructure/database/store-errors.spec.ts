import { QueryFailedError } from 'typeorm';
import {
  AuthorizationDenied,
  ConstraintViolation,
  StoreUnavailable,
  ValidationError,
} from '@/domain/errors';
import { translateStoreError, withStoreErrors } from './store-errors';

const driverFailure = (code: string, message: string): QueryFailedError =>
  new QueryFailedError('INSERT INTO ...', [], Object.assign(new Error(message), { code }));

describe('translateStoreError', () => {
  it('should map unique failures to ConstraintViolation with the column', () => {
    const error = translateStoreError(
      driverFailure('SQLITE_CONSTRAINT_UNIQUE', 'UNIQUE constraint failed: users.email'),
      'users.create',
    );

    expect(error).toBeInstanceOf(ConstraintViolation);
    expect(error).toMatchObject({ field: 'email' });
  });

  it('should map primary key failures to ConstraintViolation', () => {
    const error = translateStoreError(
      driverFailure('SQLITE_CONSTRAINT_PRIMARYKEY', 'UNIQUE constraint failed: applicants.id'),
      'applicants.insert',
    );

    expect(error).toMatchObject({ field: 'id', code: 'CONSTRAINT_VIOLATION' });
  });

  it('should map not-null failures to ValidationError', () => {
    const error = translateStoreError(
      driverFailure('SQLITE_CONSTRAINT_NOTNULL', 'NOT NULL constraint failed: applicants.region'),
      'applicants.insert',
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'region', value: null });
  });

  it('should map check failures to ValidationError', () => {
    const error = translateStoreError(
      driverFailure('SQLITE_CONSTRAINT_CHECK', `CHECK constraint failed: "sex" IN ('m','f')`),
      'applicants.insert',
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'sex' });
  });

  it('should map other driver failures to StoreUnavailable', () => {
    const cause = driverFailure('SQLITE_BUSY', 'database is locked');
    const error = translateStoreError(cause, 'applicants.insert');

    expect(error).toBeInstanceOf(StoreUnavailable);
    expect(error.cause).toBe(cause);
  });

  it('should map non-driver failures to StoreUnavailable', () => {
    expect(translateStoreError(new Error('boom'), 'users.findById')).toBeInstanceOf(StoreUnavailable);
  });

  it('should pass domain errors through unchanged', () => {
    const denied = new AuthorizationDenied('update applicants');

    expect(translateStoreError(denied, 'applicants.update')).toBe(denied);
  });
});

describe('withStoreErrors', () => {
  it('should return the result of successful work', async () => {
    await expect(withStoreErrors('op', () => Promise.resolve(42))).resolves.toBe(42);
  });

  it('should rethrow failures as domain errors', async () => {
    await expect(withStoreErrors('op', () => Promise.reject(new Error('boom')))).rejects.toMatchObject({
      code: 'STORE_UNAVAILABLE',
      operation: 'op',
    });
  });
});
