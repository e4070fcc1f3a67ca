import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { UserRole } from '@/domain/models';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

const toInt = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? parseInt(value, 10) : value;

export class EnvironmentVariables {
  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  PORT: number = 3000;

  // Database
  @IsString()
  @IsOptional()
  DATABASE_PATH: string = './data/database.sqlite';

  @IsBoolean()
  @IsOptional()
  @Transform(({ value }) => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return value.toLowerCase() !== 'false';
    return true;
  })
  TYPEORM_LOGGING: boolean = true;

  // Elevated-trust path; unset disables every /admin route
  @IsString()
  @MinLength(16)
  @IsOptional()
  SERVICE_ROLE_KEY?: string;

  // Access policy; empty keeps inserts open to every caller
  @IsEnum(UserRole, { each: true })
  @IsOptional()
  @Transform(({ value }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((role) => role.trim())
          .filter((role) => role.length > 0)
      : value,
  )
  APPLICANT_INSERT_ROLES: UserRole[] = [];

  // Rate Limiting
  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  RATE_LIMIT_TTL: number = 60;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  RATE_LIMIT_MAX: number = 100;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints
          ? Object.values(error.constraints).join(', ')
          : 'unknown error';
        return `${error.property}: ${constraints}`;
      })
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return validatedConfig;
}
