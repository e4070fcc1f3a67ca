import { Inject, Injectable } from '@nestjs/common';
import { ConstraintViolation } from '@/domain/errors';
import { User } from '@/domain/models';
import { ANONYMOUS_CALLER, CallerContext } from '@/domain/policies';
import type { UserRepository } from '@/domain/repositories';
import { USER_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { CreateUserDto } from '@/application/dtos';
import { validateInput } from '@/application/validation';

/**
 * Identity store operations. Passwords arrive already hashed; this service
 * never sees or checks a plain password.
 */
@Injectable()
export class IdentityService {
  constructor(
    @Inject(USER_REPOSITORY)
    private readonly userRepository: UserRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Registers a user.
   * @throws {ValidationError} When email or hash is missing, or the role is unknown
   * @throws {ConstraintViolation} When the email is already registered, in any letter case
   */
  async createUser(input: unknown): Promise<User> {
    const dto = validateInput(CreateUserDto, input);

    this.logger.log('Creating user', { role: dto.role });

    const existing = await this.userRepository.findByEmail(dto.email);
    if (existing) {
      throw new ConstraintViolation('email', 'email is already registered');
    }

    const user = await this.userRepository.create({
      email: dto.email,
      passwordHash: dto.passwordHash,
      role: dto.role,
    });

    this.logger.log('User created successfully', { id: user.id });

    return user;
  }

  /** Case-insensitive lookup; null when no user holds the email. */
  async findByEmail(email: string): Promise<User | null> {
    return this.userRepository.findByEmail(email);
  }

  /**
   * Resolves the caller of a request. Absent or unknown ids are anonymous.
   */
  async resolveCaller(userId: string | undefined): Promise<CallerContext> {
    if (!userId) {
      return ANONYMOUS_CALLER;
    }

    const user = await this.userRepository.findById(userId);
    if (!user) {
      this.logger.debug('Unknown caller id, treating as anonymous', { userId });
      return ANONYMOUS_CALLER;
    }

    return { userId: user.id, role: user.role };
  }
}
