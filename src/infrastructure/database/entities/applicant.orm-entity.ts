import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import {
  BusinessPremise,
  BusinessSector,
  EnterpriseCategory,
  ModeOfFinance,
  OwnershipForm,
  Sex,
} from '@/domain/models';

const money = { type: 'decimal', precision: 18, scale: 2 } as const;

/**
 * ORM entity for applicant intake records.
 * Closed-set columns are simple-enum so the database rejects values outside the set as well.
 * total_employees is written from male + female on every write path and never mapped back.
 */
@Entity('applicants')
export class ApplicantEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'auto_number', type: 'integer', unique: true })
  autoNumber!: number;

  @Index()
  @Column({ type: 'varchar' })
  region!: string;

  @Column({ type: 'varchar' })
  zone!: string;

  @Column({ type: 'varchar' })
  woreda!: string;

  @Column({ type: 'varchar' })
  kebele!: string;

  @Index()
  @Column({ type: 'varchar' })
  batch!: string;

  @Column({ name: 'first_name', type: 'varchar' })
  firstName!: string;

  @Column({ name: 'father_name', type: 'varchar' })
  fatherName!: string;

  @Column({ name: 'grandfather_name', type: 'varchar' })
  grandfatherName!: string;

  @Column({ name: 'date_of_birth', type: 'date' })
  dateOfBirth!: string;

  @Column({ type: 'simple-enum', enum: Sex })
  sex!: Sex;

  @Column({ name: 'applicant_address', type: 'varchar' })
  applicantAddress!: string;

  @Column({ name: 'has_business_license', type: 'boolean' })
  hasBusinessLicense!: boolean;

  @Column({ name: 'trade_license_number', type: 'varchar', nullable: true })
  tradeLicenseNumber!: string | null;

  @Column({ type: 'varchar', nullable: true })
  trade!: string | null;

  @Column({ name: 'registration_number', type: 'varchar', nullable: true })
  registrationNumber!: string | null;

  @Column({ name: 'tin_number', type: 'varchar', nullable: true })
  tinNumber!: string | null;

  @Column({ name: 'date_of_business_license', type: 'date', nullable: true })
  dateOfBusinessLicense!: string | null;

  @Column({ name: 'enterprise_category', type: 'simple-enum', enum: EnterpriseCategory })
  enterpriseCategory!: EnterpriseCategory;

  @Column({ name: 'ownership_form', type: 'simple-enum', enum: OwnershipForm })
  ownershipForm!: OwnershipForm;

  @Column({ name: 'business_sector', type: 'simple-enum', enum: BusinessSector })
  businessSector!: BusinessSector;

  @Column({ name: 'number_of_owners', type: 'integer' })
  numberOfOwners!: number;

  @Column({ name: 'owners_names', type: 'varchar' })
  ownersNames!: string;

  @Column({ name: 'registered_address', type: 'varchar' })
  registeredAddress!: string;

  @Column({ name: 'business_premise', type: 'simple-enum', enum: BusinessPremise })
  businessPremise!: BusinessPremise;

  @Column({ name: 'male_employees', type: 'integer' })
  maleEmployees!: number;

  @Column({ name: 'female_employees', type: 'integer' })
  femaleEmployees!: number;

  @Column({ name: 'total_employees', type: 'integer' })
  totalEmployees!: number;

  @Column({ name: 'business_capital_etb', ...money })
  businessCapitalEtb!: number;

  @Column({ name: 'monthly_revenue_etb', ...money })
  monthlyRevenueEtb!: number;

  @Column({ name: 'annual_revenue_last3', ...money })
  annualRevenueLast3!: number;

  @Column({ name: 'net_profit_last3', ...money })
  netProfitLast3!: number;

  @Column({ name: 'financing_required_etb', ...money })
  financingRequiredEtb!: number;

  @Column({ name: 'source_of_repayment', type: 'varchar' })
  sourceOfRepayment!: string;

  @Column({ name: 'purpose_of_funds', type: 'varchar' })
  purposeOfFunds!: string;

  @Column({ name: 'guarantor_first_name', type: 'varchar' })
  guarantorFirstName!: string;

  @Column({ name: 'guarantor_father_name', type: 'varchar' })
  guarantorFatherName!: string;

  @Column({ name: 'guarantor_grandfather_name', type: 'varchar' })
  guarantorGrandfatherName!: string;

  @Column({ name: 'guarantor_phone', type: 'varchar' })
  guarantorPhone!: string;

  @Column({ name: 'guarantor_monthly_income', ...money })
  guarantorMonthlyIncome!: number;

  @Column({ name: 'credit_history', type: 'varchar' })
  creditHistory!: string;

  @Column({ name: 'cbe_account_number', type: 'varchar' })
  cbeAccountNumber!: string;

  @Column({ name: 'cbe_branch', type: 'varchar' })
  cbeBranch!: string;

  @Column({ name: 'cbe_city', type: 'varchar' })
  cbeCity!: string;

  @Column({ name: 'mode_of_finance', type: 'simple-enum', enum: ModeOfFinance })
  modeOfFinance!: ModeOfFinance;

  /** Weak reference to users.id; not a foreign key. */
  @Column({ name: 'collected_by', type: 'varchar', length: 36, nullable: true })
  collectedBy!: string | null;

  @Index()
  @Column({ name: 'date_collected', type: 'date' })
  dateCollected!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
