import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError as ClassValidatorError, ValidatorOptions, validateSync } from 'class-validator';
import { ValidationError } from '@/domain/errors';

export const VALIDATOR_OPTIONS: ValidatorOptions = {
  whitelist: true,
  forbidNonWhitelisted: true,
};

/** Walks nested errors down to the first one that carries a constraint message. */
function firstFailure(errors: ClassValidatorError[], parentPath = ''): { field: string; value: unknown; message: string } | null {
  for (const error of errors) {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      return { field, value: error.value, message: messages[0] };
    }
    const nested = firstFailure(error.children ?? [], field);
    if (nested) {
      return nested;
    }
  }
  return null;
}

/**
 * Converts class-validator output into the domain ValidationError.
 * Also used as the ValidationPipe exceptionFactory, so HTTP and service callers see the same error.
 */
export function toValidationError(errors: ClassValidatorError[]): ValidationError {
  const failure = firstFailure(errors);
  if (!failure) {
    return new ValidationError('input', undefined, 'Invalid input');
  }
  return new ValidationError(failure.field, failure.value, failure.message);
}

/**
 * Transforms a plain object into `cls` and validates it.
 * @throws {ValidationError} On the first failing field
 */
export function validateInput<T extends object>(cls: ClassConstructor<T>, input: unknown): T {
  if (typeof input !== 'object' || input === null) {
    throw new ValidationError('input', input, 'Input must be an object');
  }

  const instance = plainToInstance(cls, input);
  const errors = validateSync(instance, VALIDATOR_OPTIONS);
  if (errors.length > 0) {
    throw toValidationError(errors);
  }
  return instance;
}
