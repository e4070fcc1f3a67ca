import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional, IsUUID } from 'class-validator';
import {
  Applicant,
  ApplicantFields,
  BusinessPremise,
  BusinessSector,
  EnterpriseCategory,
  ModeOfFinance,
  OwnershipForm,
  Sex,
} from '@/domain/models';
import {
  Amount,
  CalendarDate,
  Count,
  OneOf,
  OptionalCalendarDate,
  OptionalText,
  RequiredText,
} from './field-decorators';

/**
 * Intake form submitted by a collector.
 * totalEmployees is deliberately absent: it is derived and cannot be supplied.
 */
export class CreateApplicantDto {
  // Location / admin
  @RequiredText('Region', 'Amhara')
  region!: string;

  @RequiredText('Zone', 'North Gondar')
  zone!: string;

  @RequiredText('Woreda', 'Gondar Zuria')
  woreda!: string;

  @RequiredText('Kebele', '05')
  kebele!: string;

  @RequiredText('Collection batch', 'B-2024-01')
  batch!: string;

  // Identity
  @RequiredText('Applicant first name', 'Abebe')
  firstName!: string;

  @RequiredText('Father name', 'Kebede')
  fatherName!: string;

  @RequiredText('Grandfather name', 'Tesfaye')
  grandfatherName!: string;

  @CalendarDate('Date of birth', '1990-01-01')
  dateOfBirth!: string;

  @OneOf(Sex, 'm for male, f for female')
  sex!: Sex;

  @RequiredText('Applicant address as per kebele ID', 'Gondar, Kebele 05, House 112')
  applicantAddress!: string;

  // Business licensing
  @ApiProperty({ description: 'Whether the business holds a licence', example: true })
  @IsBoolean({ message: '$property must be a boolean' })
  hasBusinessLicense!: boolean;

  @OptionalText('Trade licence number', 'TL/0001/2016')
  tradeLicenseNumber?: string | null;

  @OptionalText('Trade', 'Food processing')
  trade?: string | null;

  @OptionalText('Registration number', 'REG-4410')
  registrationNumber?: string | null;

  @OptionalText('TIN number', '0012345678')
  tinNumber?: string | null;

  @OptionalCalendarDate('Date of business licence registration; ignored without a licence', '2023-03-15')
  dateOfBusinessLicense?: string | null;

  // Enterprise
  @OneOf(EnterpriseCategory, 'Category of enterprise')
  enterpriseCategory!: EnterpriseCategory;

  @OneOf(OwnershipForm, 'Form of ownership')
  ownershipForm!: OwnershipForm;

  @OneOf(BusinessSector, 'Business sector')
  businessSector!: BusinessSector;

  @Count('Number of owners', 1, 1)
  numberOfOwners!: number;

  @RequiredText('Name(s) of owners', 'Abebe Kebede')
  ownersNames!: string;

  @RequiredText('Registered address', 'Gondar, Piazza')
  registeredAddress!: string;

  @OneOf(BusinessPremise, 'Business premise')
  businessPremise!: BusinessPremise;

  @Count('Male employees', 3)
  maleEmployees!: number;

  @Count('Female employees', 2)
  femaleEmployees!: number;

  // Financials
  @Amount('Business capital (ETB)', 150000)
  businessCapitalEtb!: number;

  @Amount('Monthly revenue (ETB)', 25000)
  monthlyRevenueEtb!: number;

  @Amount('Annual revenue, last 3 years total (ETB)', 900000)
  annualRevenueLast3!: number;

  @Amount('Net profit, last 1-3 years (ETB)', 120000)
  netProfitLast3!: number;

  @Amount('Amount of financing required (ETB)', 300000)
  financingRequiredEtb!: number;

  @RequiredText('Source of repayment', 'Business income')
  sourceOfRepayment!: string;

  @RequiredText('Purpose of the funds', 'Working capital')
  purposeOfFunds!: string;

  // Guarantee
  @RequiredText('Guarantor first name', 'Almaz')
  guarantorFirstName!: string;

  @RequiredText('Guarantor father name', 'Haile')
  guarantorFatherName!: string;

  @RequiredText('Guarantor grandfather name', 'Gebre')
  guarantorGrandfatherName!: string;

  @RequiredText('Guarantor phone', '+251911000000')
  guarantorPhone!: string;

  @Amount('Guarantor monthly income (ETB)', 12000)
  guarantorMonthlyIncome!: number;

  // Banking
  @RequiredText('Credit history', 'No prior loans')
  creditHistory!: string;

  @RequiredText('C.B.E business current account number', '1000123456789')
  cbeAccountNumber!: string;

  @RequiredText('C.B.E branch', 'Gondar Main')
  cbeBranch!: string;

  @RequiredText('C.B.E city', 'Gondar')
  cbeCity!: string;

  @OneOf(ModeOfFinance, 'Mode of finance')
  modeOfFinance!: ModeOfFinance;

  // Audit
  @ApiPropertyOptional({
    description: 'Collector user id; defaults to the calling user',
    format: 'uuid',
    type: String,
    nullable: true,
  })
  @IsOptional()
  @IsUUID('all', { message: '$property must be a UUID' })
  collectedBy?: string | null;

  @CalendarDate('Date the data was collected', '2024-05-20')
  dateCollected!: string;

  /**
   * Intake fields as they are stored. Missing licence fields become null and the
   * licence date is dropped when the business holds no licence.
   * @param defaultCollector - Used when collectedBy was not supplied; an explicit null is kept
   */
  static toFields(dto: CreateApplicantDto, defaultCollector: string | null): ApplicantFields {
    return Applicant.fieldsOf({
      ...dto,
      tradeLicenseNumber: dto.tradeLicenseNumber ?? null,
      trade: dto.trade ?? null,
      registrationNumber: dto.registrationNumber ?? null,
      tinNumber: dto.tinNumber ?? null,
      dateOfBusinessLicense: dto.hasBusinessLicense ? (dto.dateOfBusinessLicense ?? null) : null,
      collectedBy: dto.collectedBy === undefined ? defaultCollector : dto.collectedBy,
    });
  }
}
