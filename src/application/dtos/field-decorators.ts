import { applyDecorators } from '@nestjs/common';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsEnum, IsInt, IsISO8601, IsNotEmpty, IsNumber, IsOptional, IsString, Matches, Min } from 'class-validator';

/** Calendar date without time, as captured on the intake form. */
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const DATE_MESSAGE = '$property must be a date in YYYY-MM-DD format';

/** YYYY-MM-DD naming a day that exists; 2024-02-31 fails. */
export const IsCalendarDate = () =>
  applyDecorators(
    Matches(ISO_DATE, { message: DATE_MESSAGE }),
    IsISO8601({ strict: true, strictSeparator: true }, { message: DATE_MESSAGE }),
  );

const trimmed = (value: unknown): unknown => (typeof value === 'string' ? value.trim() : value);

const trim = ({ value }: TransformFnParams): unknown => trimmed(value);

const blankToNull = ({ value }: TransformFnParams): unknown => {
  const result = trimmed(value);
  return result === '' ? null : result;
};

/** Non-empty, trimmed text. */
export const RequiredText = (description: string, example: string) =>
  applyDecorators(
    ApiProperty({ description, example }),
    Transform(trim),
    IsString({ message: '$property must be a string' }),
    IsNotEmpty({ message: '$property is required' }),
  );

/** Text that may be absent; blank input is stored as null. */
export const OptionalText = (description: string, example: string) =>
  applyDecorators(
    ApiPropertyOptional({ description, example, type: String, nullable: true }),
    Transform(blankToNull),
    IsOptional(),
    IsString({ message: '$property must be a string' }),
  );

export const CalendarDate = (description: string, example: string) =>
  applyDecorators(
    ApiProperty({ description, example, type: String, format: 'date' }),
    IsNotEmpty({ message: '$property is required' }),
    IsCalendarDate(),
  );

export const OptionalCalendarDate = (description: string, example: string) =>
  applyDecorators(
    ApiPropertyOptional({ description, example, type: String, format: 'date', nullable: true }),
    Transform(blankToNull),
    IsOptional(),
    IsCalendarDate(),
  );

/** Closed-set field: anything outside the enum's values is rejected. */
export const OneOf = (values: Record<string, string>, description: string) =>
  applyDecorators(
    ApiProperty({ description, enum: values }),
    IsNotEmpty({ message: '$property is required' }),
    IsEnum(values, { message: `$property must be one of: ${Object.values(values).join(', ')}` }),
  );

export const Count = (description: string, example: number, minimum = 0) =>
  applyDecorators(
    ApiProperty({ description, example, minimum, type: 'integer' }),
    IsInt({ message: '$property must be an integer' }),
    Min(minimum, { message: `$property must be at least ${minimum}` }),
  );

/** Non-negative ETB amount with at most two decimals. */
export const Amount = (description: string, example: number) =>
  applyDecorators(
    ApiProperty({ description, example, minimum: 0 }),
    IsNumber(
      { allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 },
      { message: '$property must be a number with at most 2 decimals' },
    ),
    Min(0, { message: '$property must not be negative' }),
  );
