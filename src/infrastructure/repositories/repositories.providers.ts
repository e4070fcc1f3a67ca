import { Provider } from '@nestjs/common';
import {
  APPLICANT_REPOSITORY,
  ELEVATED_APPLICANT_REPOSITORY,
  USER_REPOSITORY,
} from '@/domain/repositories';
import { TypeOrmApplicantRepository } from './applicant.repository';
import { TypeOrmElevatedApplicantRepository } from './elevated-applicant.repository';
import { TypeOrmUserRepository } from './user.repository';

export const repositoriesProviders: Provider[] = [
  {
    provide: USER_REPOSITORY,
    useClass: TypeOrmUserRepository,
  },
  {
    provide: APPLICANT_REPOSITORY,
    useClass: TypeOrmApplicantRepository,
  },
  {
    provide: ELEVATED_APPLICANT_REPOSITORY,
    useClass: TypeOrmElevatedApplicantRepository,
  },
];
