import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { UserRole } from '@/domain/models';

export class CreateUserDto {
  @ApiProperty({
    description: 'User email; compared case-insensitively',
    example: 'collector@example.com',
    maxLength: 255,
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsNotEmpty({ message: 'email is required' })
  @IsEmail({}, { message: 'email must be a valid email' })
  @MaxLength(255, { message: 'email must have at most 255 characters' })
  email!: string;

  @ApiProperty({
    description: 'Password hash produced by the authentication collaborator',
    example: '$2b$10$examplehashexamplehashexamplehashexample',
  })
  @IsNotEmpty({ message: 'passwordHash is required' })
  @IsString({ message: 'passwordHash must be a string' })
  passwordHash!: string;

  @ApiProperty({ description: 'User role', enum: UserRole, example: UserRole.COLLECTOR })
  @IsNotEmpty({ message: 'role is required' })
  @IsEnum(UserRole, { message: `role must be one of: ${Object.values(UserRole).join(', ')}` })
  role!: UserRole;
}
