import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { UserRole } from '@/domain/models';
import {
  APPLICANT_ACCESS_POLICY,
  ApplicantAccessPolicy,
  OpenApplicantPolicy,
  RoleScopedApplicantPolicy,
} from '@/domain/policies';
import { buildApplicantFields } from '@/testing';
import { accessPolicyProviders } from './access-policy.providers';

describe('accessPolicyProviders', () => {
  const resolve = async (insertRoles: UserRole[] | undefined): Promise<ApplicantAccessPolicy> => {
    const module = await Test.createTestingModule({
      providers: [
        ...accessPolicyProviders,
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(insertRoles) } },
      ],
    }).compile();

    return module.get<ApplicantAccessPolicy>(APPLICANT_ACCESS_POLICY);
  };

  it('should use the open policy when no roles are configured', async () => {
    expect(await resolve(undefined)).toBeInstanceOf(OpenApplicantPolicy);
    expect(await resolve([])).toBeInstanceOf(OpenApplicantPolicy);
  });

  it('should scope inserts to the configured roles', async () => {
    const policy = await resolve([UserRole.ADMIN]);

    expect(policy).toBeInstanceOf(RoleScopedApplicantPolicy);
    expect(policy.canInsert({ userId: 'u1', role: UserRole.COLLECTOR }, buildApplicantFields())).toBe(false);
  });
});
