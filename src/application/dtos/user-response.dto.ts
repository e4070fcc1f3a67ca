import { ApiProperty } from '@nestjs/swagger';
import { User, UserRole } from '@/domain/models';

export class UserResponseDto {
  @ApiProperty({ description: 'User ID', format: 'uuid' })
  id!: string;

  @ApiProperty({ description: 'User email', example: 'collector@example.com' })
  email!: string;

  @ApiProperty({ description: 'User role', enum: UserRole, example: UserRole.COLLECTOR })
  role!: UserRole;

  @ApiProperty({
    description: 'Creation date',
    example: '2024-01-15T10:30:00.000Z',
  })
  createdAt!: Date;

  static fromEntity(user: User): UserResponseDto {
    const dto = new UserResponseDto();
    dto.id = user.id;
    dto.email = user.email;
    dto.role = user.role;
    dto.createdAt = user.createdAt;
    return dto;
  }
}

/** Lookup result for the authentication collaborator, which verifies the hash itself. */
export class UserCredentialsResponseDto extends UserResponseDto {
  @ApiProperty({ description: 'Stored password hash' })
  passwordHash!: string;

  static fromUser(user: User): UserCredentialsResponseDto {
    return Object.assign(new UserCredentialsResponseDto(), UserResponseDto.fromEntity(user), {
      passwordHash: user.passwordHash,
    });
  }
}
