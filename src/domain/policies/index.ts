export {
  APPLICANT_ACCESS_POLICY,
  OpenApplicantPolicy,
  RoleScopedApplicantPolicy,
} from './applicant-access.policy';
export type { ApplicantAccessPolicy } from './applicant-access.policy';
export { ANONYMOUS_CALLER } from './caller-context';
export type { CallerContext } from './caller-context';
export { ElevatedTrust } from './elevated-trust';
