import { Applicant } from '@/domain/models';
import { ApplicantEntity } from '@/infrastructure/database/entities';
import { buildApplicantFields } from '@/testing';
import { ApplicantMapper } from './applicant.mapper';

describe('ApplicantMapper', () => {
  const createEntity = (overrides: Partial<ApplicantEntity> = {}): ApplicantEntity =>
    Object.assign(new ApplicantEntity(), {
      ...buildApplicantFields(),
      id: '9c1f0e2d-3b4a-4c5d-8e6f-7a8b9c0d1e2f',
      autoNumber: 8,
      totalEmployees: 5,
      createdAt: new Date('2024-05-20T08:00:00Z'),
      ...overrides,
    });

  describe('toDomain', () => {
    it('should convert an entity to the Applicant domain model', () => {
      const applicant = ApplicantMapper.toDomain(createEntity());

      expect(applicant).toBeInstanceOf(Applicant);
      expect(applicant.id).toBe('9c1f0e2d-3b4a-4c5d-8e6f-7a8b9c0d1e2f');
      expect(applicant.autoNumber).toBe(8);
      expect(applicant.fields).toEqual(buildApplicantFields());
    });

    it('should derive the total instead of trusting the stored column', () => {
      const applicant = ApplicantMapper.toDomain(createEntity({ totalEmployees: 999 }));

      expect(applicant.totalEmployees).toBe(5);
    });

    it('should parse decimal columns returned as strings', () => {
      const entity = createEntity();
      Object.assign(entity, { businessCapitalEtb: '150000.00', guarantorMonthlyIncome: '12000.50' });

      const applicant = ApplicantMapper.toDomain(entity);

      expect(applicant.fields.businessCapitalEtb).toBe(150000);
      expect(applicant.fields.guarantorMonthlyIncome).toBe(12000.5);
    });
  });

  describe('toColumns', () => {
    it('should add the recomputed total to the intake fields', () => {
      const columns = ApplicantMapper.toColumns(buildApplicantFields({ maleEmployees: 7, femaleEmployees: 1 }));

      expect(columns).toEqual({
        ...buildApplicantFields({ maleEmployees: 7, femaleEmployees: 1 }),
        totalEmployees: 8,
      });
    });
  });
});
