export {
  Applicant,
  BusinessPremise,
  BusinessSector,
  EnterpriseCategory,
  ModeOfFinance,
  OwnershipForm,
  Sex,
} from './applicant.model';
export type { ApplicantFields, ApplicantProps, ApplicantSnapshot } from './applicant.model';
export { User, UserRole } from './user.model';
export type { UserProps } from './user.model';
