import { Applicant, ApplicantFields } from '@/domain/models';
import { ApplicantEntity } from '@/infrastructure/database/entities';

/** Column values written on insert/update (identity and timestamps excluded). */
export type ApplicantColumns = Omit<ApplicantEntity, 'id' | 'autoNumber' | 'createdAt'>;

/** Data Mapper: converts between the applicants ORM entity and the Applicant domain model. */
export class ApplicantMapper {
  /**
   * Converts ORM entity to domain model.
   * The stored total_employees is dropped; the model derives it from the head counts.
   */
  static toDomain(entity: ApplicantEntity): Applicant {
    return new Applicant({
      ...Applicant.fieldsOf(entity),
      id: entity.id,
      autoNumber: entity.autoNumber,
      businessCapitalEtb: Number(entity.businessCapitalEtb),
      monthlyRevenueEtb: Number(entity.monthlyRevenueEtb),
      annualRevenueLast3: Number(entity.annualRevenueLast3),
      netProfitLast3: Number(entity.netProfitLast3),
      financingRequiredEtb: Number(entity.financingRequiredEtb),
      guarantorMonthlyIncome: Number(entity.guarantorMonthlyIncome),
      createdAt: entity.createdAt,
    });
  }

  /**
   * Builds the column values for a write, recomputing totalEmployees from the head counts.
   */
  static toColumns(fields: ApplicantFields): ApplicantColumns {
    return {
      ...Applicant.fieldsOf(fields),
      totalEmployees: Applicant.totalEmployeesOf(fields),
    };
  }
}
