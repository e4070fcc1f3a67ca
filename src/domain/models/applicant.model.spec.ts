import { buildApplicantFields } from '@/testing';
import { Applicant, ApplicantProps } from './applicant.model';

describe('Applicant', () => {
  const createApplicant = (overrides: Partial<ApplicantProps> = {}): Applicant =>
    new Applicant({
      ...buildApplicantFields(),
      id: '9c1f0e2d-3b4a-4c5d-8e6f-7a8b9c0d1e2f',
      autoNumber: 7,
      createdAt: new Date('2024-05-20T08:00:00Z'),
      ...overrides,
    });

  describe('totalEmployees', () => {
    it('should be the sum of male and female employees', () => {
      expect(createApplicant({ maleEmployees: 4, femaleEmployees: 6 }).totalEmployees).toBe(10);
    });

    it.each([
      [0, 0, 0],
      [0, 5, 5],
      [8, 0, 8],
      [1000000, 2500000, 3500000],
    ])('should give %i + %i = %i', (maleEmployees, femaleEmployees, total) => {
      expect(createApplicant({ maleEmployees, femaleEmployees }).totalEmployees).toBe(total);
    });
  });

  describe('getters', () => {
    it('should expose identity and audit fields', () => {
      const applicant = createApplicant();

      expect(applicant.id).toBe('9c1f0e2d-3b4a-4c5d-8e6f-7a8b9c0d1e2f');
      expect(applicant.autoNumber).toBe(7);
      expect(applicant.region).toBe('Amhara');
      expect(applicant.batch).toBe('B-01');
      expect(applicant.collectedBy).toBe('6f1d2c3b-4a5e-4f70-8a9b-0c1d2e3f4a5b');
      expect(applicant.dateCollected).toBe('2024-05-20');
    });

    it('should build the full name from the three name parts', () => {
      expect(createApplicant().fullName).toBe('Abebe Kebede Tesfaye');
    });
  });

  describe('fields', () => {
    it('should return only the intake fields', () => {
      const fields = createApplicant().fields;

      expect(fields).toEqual(buildApplicantFields());
      expect(fields).not.toHaveProperty('id');
      expect(fields).not.toHaveProperty('autoNumber');
      expect(fields).not.toHaveProperty('totalEmployees');
    });
  });

  describe('fieldsOf', () => {
    it('should drop keys that are not intake fields', () => {
      const source = { ...buildApplicantFields(), totalEmployees: 999, extra: 'x' };

      expect(Applicant.fieldsOf(source)).toEqual(buildApplicantFields());
    });
  });

  describe('toPlainObject', () => {
    it('should include the derived total', () => {
      const plain = createApplicant({ maleEmployees: 3, femaleEmployees: 2 }).toPlainObject();

      expect(plain.totalEmployees).toBe(5);
      expect(plain.autoNumber).toBe(7);
      expect(plain.createdAt).toEqual(new Date('2024-05-20T08:00:00Z'));
    });
  });
});
