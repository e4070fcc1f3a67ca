export { ApplicantMapper } from './applicant.mapper';
export type { ApplicantColumns } from './applicant.mapper';
export { UserMapper } from './user.mapper';
