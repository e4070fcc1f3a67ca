import { User, UserRole } from '@/domain/models';

export interface CreateUserData {
  email: string;
  passwordHash: string;
  role: UserRole;
}

export const USER_REPOSITORY = Symbol('USER_REPOSITORY');

/**
 * Identity store. Emails are normalized by the implementation, so lookups
 * and the uniqueness constraint are case-insensitive.
 */
export interface UserRepository {
  /** @throws {ConstraintViolation} When the email is already registered */
  create(data: CreateUserData): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
}
