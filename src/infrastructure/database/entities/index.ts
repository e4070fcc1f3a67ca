import { ApplicantEntity } from './applicant.orm-entity';
import { SequenceEntity } from './sequence.orm-entity';
import { UserEntity } from './user.orm-entity';

export { ApplicantEntity, SequenceEntity, UserEntity };

export const ENTITIES = [UserEntity, ApplicantEntity, SequenceEntity];
