export { APPLICANT_REPOSITORY, ELEVATED_APPLICANT_REPOSITORY } from './applicant.repository.interface';
export type {
  ApplicantFilter,
  ApplicantRepository,
  ElevatedApplicantRepository,
  FindAllOptions,
  FindAllResult,
  InsertApplicantData,
} from './applicant.repository.interface';

export { USER_REPOSITORY } from './user.repository.interface';
export type { CreateUserData, UserRepository } from './user.repository.interface';
