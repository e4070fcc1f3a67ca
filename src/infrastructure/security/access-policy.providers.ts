import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  APPLICANT_ACCESS_POLICY,
  ApplicantAccessPolicy,
  OpenApplicantPolicy,
  RoleScopedApplicantPolicy,
} from '@/domain/policies';
import type { EnvironmentVariables } from '@/infrastructure/config';

/**
 * Chooses the applicant access policy from APPLICANT_INSERT_ROLES.
 * No roles configured keeps the open policy.
 */
export const accessPolicyProviders: Provider[] = [
  {
    provide: APPLICANT_ACCESS_POLICY,
    inject: [ConfigService],
    useFactory: (configService: ConfigService<EnvironmentVariables>): ApplicantAccessPolicy => {
      const insertRoles = configService.get('APPLICANT_INSERT_ROLES', { infer: true }) ?? [];
      return insertRoles.length > 0 ? new RoleScopedApplicantPolicy(insertRoles) : new OpenApplicantPolicy();
    },
  },
];
