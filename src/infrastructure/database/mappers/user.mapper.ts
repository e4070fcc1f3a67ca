import { User } from '@/domain/models';
import { UserEntity } from '@/infrastructure/database/entities';

/** Data Mapper: converts between the users ORM entity and the User domain model. */
export class UserMapper {
  static toDomain(entity: UserEntity): User {
    return new User({
      id: entity.id,
      email: entity.email,
      passwordHash: entity.passwordHash,
      role: entity.role,
      createdAt: entity.createdAt,
    });
  }
}
