export { AdminController } from './admin.controller';
export { ApplicantController } from './applicant.controller';
export { HealthController } from './health.controller';
