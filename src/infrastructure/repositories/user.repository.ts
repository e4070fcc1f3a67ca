import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@/domain/models';
import type { CreateUserData, UserRepository } from '@/domain/repositories';
import { UserEntity } from '@/infrastructure/database/entities';
import { UserMapper } from '@/infrastructure/database/mappers';
import { withStoreErrors } from '@/infrastructure/database/store-errors';

/**
 * TypeORM implementation of the identity store.
 * Emails are normalized before they reach the unique index.
 */
@Injectable()
export class TypeOrmUserRepository implements UserRepository {
  constructor(
    @InjectRepository(UserEntity)
    private readonly repository: Repository<UserEntity>,
  ) {}

  /** Inserts a user in one statement; the unique index settles concurrent duplicates. */
  async create(data: CreateUserData): Promise<User> {
    const id = randomUUID();

    return withStoreErrors('users.create', async () => {
      await this.repository.insert({
        id,
        email: User.normalizeEmail(data.email),
        passwordHash: data.passwordHash,
        role: data.role,
      });

      const saved = await this.repository.findOneByOrFail({ id });
      return UserMapper.toDomain(saved);
    });
  }

  async findByEmail(email: string): Promise<User | null> {
    const entity = await withStoreErrors('users.findByEmail', () =>
      this.repository.findOneBy({ email: User.normalizeEmail(email) }),
    );

    return entity ? UserMapper.toDomain(entity) : null;
  }

  async findById(id: string): Promise<User | null> {
    const entity = await withStoreErrors('users.findById', () => this.repository.findOneBy({ id }));

    return entity ? UserMapper.toDomain(entity) : null;
  }
}
