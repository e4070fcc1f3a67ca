import {
  ApplicantFields,
  BusinessPremise,
  BusinessSector,
  EnterpriseCategory,
  ModeOfFinance,
  OwnershipForm,
  Sex,
} from '@/domain/models';

export const COLLECTOR_ID = '6f1d2c3b-4a5e-4f70-8a9b-0c1d2e3f4a5b';

/** A complete, valid intake form as a collector would submit it. */
export const buildApplicantInput = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  region: 'Amhara',
  zone: 'North Gondar',
  woreda: 'Gondar Zuria',
  kebele: '05',
  batch: 'B-01',
  firstName: 'Abebe',
  fatherName: 'Kebede',
  grandfatherName: 'Tesfaye',
  dateOfBirth: '1990-01-01',
  sex: 'm',
  applicantAddress: 'Kebele 05, House 12',
  hasBusinessLicense: true,
  tradeLicenseNumber: 'TL-001',
  trade: 'Bakery',
  registrationNumber: 'REG-1',
  tinNumber: '0012345678',
  dateOfBusinessLicense: '2023-03-15',
  enterpriseCategory: 'micro',
  ownershipForm: 'soleproprietorship',
  businessSector: 'manufacturing',
  numberOfOwners: 1,
  ownersNames: 'Abebe Kebede',
  registeredAddress: 'Piazza',
  businessPremise: 'rented',
  maleEmployees: 3,
  femaleEmployees: 2,
  businessCapitalEtb: 150000,
  monthlyRevenueEtb: 25000.5,
  annualRevenueLast3: 900000,
  netProfitLast3: 120000,
  financingRequiredEtb: 300000,
  sourceOfRepayment: 'Business income',
  purposeOfFunds: 'Working capital',
  guarantorFirstName: 'Almaz',
  guarantorFatherName: 'Haile',
  guarantorGrandfatherName: 'Gebre',
  guarantorPhone: '+251911000000',
  guarantorMonthlyIncome: 12000,
  creditHistory: 'No prior loans',
  cbeAccountNumber: '1000123456789',
  cbeBranch: 'Gondar Main',
  cbeCity: 'Gondar',
  modeOfFinance: 'conventional',
  dateCollected: '2024-05-20',
  ...overrides,
});

/** The stored form of buildApplicantInput(). */
export const buildApplicantFields = (overrides: Partial<ApplicantFields> = {}): ApplicantFields => ({
  region: 'Amhara',
  zone: 'North Gondar',
  woreda: 'Gondar Zuria',
  kebele: '05',
  batch: 'B-01',
  firstName: 'Abebe',
  fatherName: 'Kebede',
  grandfatherName: 'Tesfaye',
  dateOfBirth: '1990-01-01',
  sex: Sex.MALE,
  applicantAddress: 'Kebele 05, House 12',
  hasBusinessLicense: true,
  tradeLicenseNumber: 'TL-001',
  trade: 'Bakery',
  registrationNumber: 'REG-1',
  tinNumber: '0012345678',
  dateOfBusinessLicense: '2023-03-15',
  enterpriseCategory: EnterpriseCategory.MICRO,
  ownershipForm: OwnershipForm.SOLE_PROPRIETORSHIP,
  businessSector: BusinessSector.MANUFACTURING,
  numberOfOwners: 1,
  ownersNames: 'Abebe Kebede',
  registeredAddress: 'Piazza',
  businessPremise: BusinessPremise.RENTED,
  maleEmployees: 3,
  femaleEmployees: 2,
  businessCapitalEtb: 150000,
  monthlyRevenueEtb: 25000.5,
  annualRevenueLast3: 900000,
  netProfitLast3: 120000,
  financingRequiredEtb: 300000,
  sourceOfRepayment: 'Business income',
  purposeOfFunds: 'Working capital',
  guarantorFirstName: 'Almaz',
  guarantorFatherName: 'Haile',
  guarantorGrandfatherName: 'Gebre',
  guarantorPhone: '+251911000000',
  guarantorMonthlyIncome: 12000,
  creditHistory: 'No prior loans',
  cbeAccountNumber: '1000123456789',
  cbeBranch: 'Gondar Main',
  cbeCity: 'Gondar',
  modeOfFinance: ModeOfFinance.CONVENTIONAL,
  collectedBy: COLLECTOR_ID,
  dateCollected: '2024-05-20',
  ...overrides,
});
