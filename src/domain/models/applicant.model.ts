export enum Sex {
  MALE = 'm',
  FEMALE = 'f',
}

export enum EnterpriseCategory {
  MICRO = 'micro',
  SMALL = 'small',
  MEDIUM = 'medium',
  STARTUP = 'startup',
}

export enum OwnershipForm {
  SOLE_PROPRIETORSHIP = 'soleproprietorship',
  PARTNERSHIP = 'partnership',
  PLC = 'plc',
}

export enum BusinessSector {
  MANUFACTURING = 'manufacturing',
  CONSTRUCTION = 'construction',
  AGRICULTURE = 'agriculture',
  MINING = 'mining',
  SERVICE = 'service',
  OTHERS = 'others',
}

export enum BusinessPremise {
  RENTED = 'rented',
  APPLICANT_OWNED = 'applicant_owned',
  GOVERNMENT = 'government',
}

export enum ModeOfFinance {
  CONVENTIONAL = 'conventional',
  IFB = 'ifb',
}

/**
 * Intake form fields as captured by a collector.
 * Dates are ISO calendar dates (YYYY-MM-DD); monetary amounts are in ETB.
 */
export interface ApplicantFields {
  // Location / admin
  region: string;
  zone: string;
  woreda: string;
  kebele: string;
  batch: string;

  // Identity
  firstName: string;
  fatherName: string;
  grandfatherName: string;
  dateOfBirth: string;
  sex: Sex;
  applicantAddress: string;

  // Business licensing
  hasBusinessLicense: boolean;
  tradeLicenseNumber: string | null;
  trade: string | null;
  registrationNumber: string | null;
  tinNumber: string | null;
  dateOfBusinessLicense: string | null;

  // Enterprise
  enterpriseCategory: EnterpriseCategory;
  ownershipForm: OwnershipForm;
  businessSector: BusinessSector;
  numberOfOwners: number;
  ownersNames: string;
  registeredAddress: string;
  businessPremise: BusinessPremise;
  maleEmployees: number;
  femaleEmployees: number;

  // Financials
  businessCapitalEtb: number;
  monthlyRevenueEtb: number;
  annualRevenueLast3: number;
  netProfitLast3: number;
  financingRequiredEtb: number;
  sourceOfRepayment: string;
  purposeOfFunds: string;

  // Guarantee
  guarantorFirstName: string;
  guarantorFatherName: string;
  guarantorGrandfatherName: string;
  guarantorPhone: string;
  guarantorMonthlyIncome: number;

  // Banking
  creditHistory: string;
  cbeAccountNumber: string;
  cbeBranch: string;
  cbeCity: string;
  modeOfFinance: ModeOfFinance;

  // Audit
  collectedBy: string | null;
  dateCollected: string;
}

/** Properties for Applicant domain model. */
export interface ApplicantProps extends ApplicantFields {
  id: string;
  autoNumber: number;
  createdAt: Date;
}

export type ApplicantSnapshot = ApplicantProps & { totalEmployees: number };

/**
 * Pure domain model for an intake record.
 * totalEmployees is derived from the two head counts and has no setter or backing field.
 */
export class Applicant {
  constructor(private readonly props: ApplicantProps) {}

  static totalEmployeesOf(counts: Pick<ApplicantFields, 'maleEmployees' | 'femaleEmployees'>): number {
    return counts.maleEmployees + counts.femaleEmployees;
  }

  /**
   * Copies exactly the intake fields out of a wider object (DTO, entity, snapshot).
   */
  static fieldsOf(source: ApplicantFields): ApplicantFields {
    return {
      region: source.region,
      zone: source.zone,
      woreda: source.woreda,
      kebele: source.kebele,
      batch: source.batch,
      firstName: source.firstName,
      fatherName: source.fatherName,
      grandfatherName: source.grandfatherName,
      dateOfBirth: source.dateOfBirth,
      sex: source.sex,
      applicantAddress: source.applicantAddress,
      hasBusinessLicense: source.hasBusinessLicense,
      tradeLicenseNumber: source.tradeLicenseNumber,
      trade: source.trade,
      registrationNumber: source.registrationNumber,
      tinNumber: source.tinNumber,
      dateOfBusinessLicense: source.dateOfBusinessLicense,
      enterpriseCategory: source.enterpriseCategory,
      ownershipForm: source.ownershipForm,
      businessSector: source.businessSector,
      numberOfOwners: source.numberOfOwners,
      ownersNames: source.ownersNames,
      registeredAddress: source.registeredAddress,
      businessPremise: source.businessPremise,
      maleEmployees: source.maleEmployees,
      femaleEmployees: source.femaleEmployees,
      businessCapitalEtb: source.businessCapitalEtb,
      monthlyRevenueEtb: source.monthlyRevenueEtb,
      annualRevenueLast3: source.annualRevenueLast3,
      netProfitLast3: source.netProfitLast3,
      financingRequiredEtb: source.financingRequiredEtb,
      sourceOfRepayment: source.sourceOfRepayment,
      purposeOfFunds: source.purposeOfFunds,
      guarantorFirstName: source.guarantorFirstName,
      guarantorFatherName: source.guarantorFatherName,
      guarantorGrandfatherName: source.guarantorGrandfatherName,
      guarantorPhone: source.guarantorPhone,
      guarantorMonthlyIncome: source.guarantorMonthlyIncome,
      creditHistory: source.creditHistory,
      cbeAccountNumber: source.cbeAccountNumber,
      cbeBranch: source.cbeBranch,
      cbeCity: source.cbeCity,
      modeOfFinance: source.modeOfFinance,
      collectedBy: source.collectedBy,
      dateCollected: source.dateCollected,
    };
  }

  get id(): string {
    return this.props.id;
  }

  get autoNumber(): number {
    return this.props.autoNumber;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get region(): string {
    return this.props.region;
  }

  get batch(): string {
    return this.props.batch;
  }

  get fullName(): string {
    return `${this.props.firstName} ${this.props.fatherName} ${this.props.grandfatherName}`;
  }

  get maleEmployees(): number {
    return this.props.maleEmployees;
  }

  get femaleEmployees(): number {
    return this.props.femaleEmployees;
  }

  get totalEmployees(): number {
    return Applicant.totalEmployeesOf(this.props);
  }

  get collectedBy(): string | null {
    return this.props.collectedBy;
  }

  get dateCollected(): string {
    return this.props.dateCollected;
  }

  /** Intake fields only, without identity or audit timestamps. */
  get fields(): ApplicantFields {
    return Applicant.fieldsOf(this.props);
  }

  /**
   * Converts to plain object for serialization, including the derived total.
   */
  toPlainObject(): ApplicantSnapshot {
    return { ...this.props, totalEmployees: this.totalEmployees };
  }
}
