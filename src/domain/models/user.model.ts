/** Closed set of actor roles. */
export enum UserRole {
  ADMIN = 'admin',
  COLLECTOR = 'collector',
}

/** Properties for User domain model. */
export interface UserProps {
  id: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  createdAt: Date;
}

/**
 * Pure domain model for User (no ORM dependencies).
 * Key: email (unique, compared case-insensitively). The password is only ever held as a hash.
 */
export class User {
  /** @param props - User properties (immutable after construction) */
  constructor(private readonly props: UserProps) {}

  /** Canonical form used for storage and lookups. */
  static normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
  }

  get id(): string {
    return this.props.id;
  }

  get email(): string {
    return this.props.email;
  }

  get passwordHash(): string {
    return this.props.passwordHash;
  }

  get role(): UserRole {
    return this.props.role;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  isAdmin(): boolean {
    return this.props.role === UserRole.ADMIN;
  }

  /**
   * Converts to plain object for serialization.
   * @returns Shallow copy of user properties
   */
  toPlainObject(): UserProps {
    return { ...this.props };
  }
}
