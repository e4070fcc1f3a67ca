export { TypeOrmApplicantRepository } from './applicant.repository';
export { TypeOrmElevatedApplicantRepository } from './elevated-applicant.repository';
export { repositoriesProviders } from './repositories.providers';
export { TypeOrmUserRepository } from './user.repository';
