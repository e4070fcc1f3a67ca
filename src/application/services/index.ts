export { AdminApplicantService } from './admin-applicant.service';
export { ApplicantService } from './applicant.service';
export type { ListApplicantsOptions } from './applicant.service';
export { HealthService } from './health.service';
export { IdentityService } from './identity.service';
