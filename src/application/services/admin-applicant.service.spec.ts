import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ValidationError } from '@/domain/errors';
import { Applicant, ApplicantFields } from '@/domain/models';
import { ElevatedTrust } from '@/domain/policies';
import type { ApplicantRepository, ElevatedApplicantRepository } from '@/domain/repositories';
import { APPLICANT_REPOSITORY, ELEVATED_APPLICANT_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { buildApplicantFields, COLLECTOR_ID } from '@/testing';
import { AdminApplicantService } from './admin-applicant.service';

describe('AdminApplicantService', () => {
  const applicantId = '9c1f0e2d-3b4a-4c5d-8e6f-7a8b9c0d1e2f';
  const serviceKey = 'test-service-role-key';

  let service: AdminApplicantService;
  let mockApplicantRepository: jest.Mocked<ApplicantRepository>;
  let mockElevatedRepository: jest.Mocked<ElevatedApplicantRepository>;
  let mockLogger: jest.Mocked<ILogger>;
  let trust: ElevatedTrust;

  const createApplicant = (fields: ApplicantFields = buildApplicantFields()): Applicant =>
    new Applicant({
      ...fields,
      id: applicantId,
      autoNumber: 3,
      createdAt: new Date('2024-05-20T08:00:00Z'),
    });

  beforeEach(async () => {
    const granted = ElevatedTrust.fromServiceKey(serviceKey, serviceKey);
    if (!granted) {
      throw new Error('Expected the service key to be accepted');
    }
    trust = granted;

    mockApplicantRepository = {
      insert: jest.fn(),
      findById: jest.fn().mockResolvedValue(createApplicant()),
      findByAutoNumber: jest.fn(),
      findAll: jest.fn(),
      select: jest.fn(),
    };

    mockElevatedRepository = {
      update: jest
        .fn()
        .mockImplementation((_trust: ElevatedTrust, _id: string, fields: ApplicantFields) =>
          Promise.resolve(createApplicant(fields)),
        ),
      remove: jest.fn().mockResolvedValue(true),
    };

    mockLogger = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdminApplicantService,
        { provide: APPLICANT_REPOSITORY, useValue: mockApplicantRepository },
        { provide: ELEVATED_APPLICANT_REPOSITORY, useValue: mockElevatedRepository },
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    service = module.get<AdminApplicantService>(AdminApplicantService);
  });

  describe('update', () => {
    it('should recompute totalEmployees from the merged counts', async () => {
      const updated = await service.update(trust, applicantId, { femaleEmployees: 7 });

      expect(updated.maleEmployees).toBe(3);
      expect(updated.femaleEmployees).toBe(7);
      expect(updated.totalEmployees).toBe(10);
    });

    it('should pass the full merged record with the capability', async () => {
      await service.update(trust, applicantId, { cbeBranch: 'Bahir Dar' });

      expect(mockElevatedRepository.update).toHaveBeenCalledWith(
        trust,
        applicantId,
        buildApplicantFields({ cbeBranch: 'Bahir Dar' }),
      );
    });

    it('should keep the original collector', async () => {
      const updated = await service.update(trust, applicantId, { batch: 'B-02' });

      expect(updated.collectedBy).toBe(COLLECTOR_ID);
    });

    it('should clear the collector when the patch sets it to null', async () => {
      const updated = await service.update(trust, applicantId, { collectedBy: null });

      expect(updated.collectedBy).toBeNull();
    });

    it('should clear the licence date when the licence is withdrawn', async () => {
      const updated = await service.update(trust, applicantId, { hasBusinessLicense: false });

      expect(updated.fields.dateOfBusinessLicense).toBeNull();
    });

    it('should reject values outside a closed set', async () => {
      await expect(service.update(trust, applicantId, { ownershipForm: 'cooperative' })).rejects.toMatchObject({
        field: 'ownershipForm',
      });
      expect(mockElevatedRepository.update).not.toHaveBeenCalled();
    });

    it('should reject attempts to set the derived total', async () => {
      await expect(service.update(trust, applicantId, { totalEmployees: 50 })).rejects.toThrow(ValidationError);
    });

    it('should reject attempts to change the auto number', async () => {
      await expect(service.update(trust, applicantId, { autoNumber: 1 })).rejects.toMatchObject({
        field: 'autoNumber',
      });
    });

    it('should throw NotFoundException when the applicant does not exist', async () => {
      mockApplicantRepository.findById.mockResolvedValue(null);

      await expect(service.update(trust, applicantId, { batch: 'B-02' })).rejects.toThrow(NotFoundException);
    });

    it('should throw NotFoundException when the row vanished before the update', async () => {
      mockElevatedRepository.update.mockResolvedValue(null);

      await expect(service.update(trust, applicantId, { batch: 'B-02' })).rejects.toThrow(NotFoundException);
    });
  });

  describe('remove', () => {
    it('should delete the applicant', async () => {
      await service.remove(trust, applicantId);

      expect(mockElevatedRepository.remove).toHaveBeenCalledWith(trust, applicantId);
    });

    it('should throw NotFoundException when nothing was deleted', async () => {
      mockElevatedRepository.remove.mockResolvedValue(false);

      await expect(service.remove(trust, applicantId)).rejects.toThrow(NotFoundException);
    });
  });
});
