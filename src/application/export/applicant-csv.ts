import type { ApplicantSnapshot } from '@/domain/models';

/** Export column order; matches the applicants table. */
export const CSV_COLUMNS: ReadonlyArray<keyof ApplicantSnapshot> = [
  'autoNumber',
  'id',
  'region',
  'zone',
  'woreda',
  'kebele',
  'batch',
  'firstName',
  'fatherName',
  'grandfatherName',
  'dateOfBirth',
  'sex',
  'applicantAddress',
  'hasBusinessLicense',
  'tradeLicenseNumber',
  'trade',
  'registrationNumber',
  'tinNumber',
  'dateOfBusinessLicense',
  'enterpriseCategory',
  'ownershipForm',
  'businessSector',
  'numberOfOwners',
  'ownersNames',
  'registeredAddress',
  'businessPremise',
  'maleEmployees',
  'femaleEmployees',
  'totalEmployees',
  'businessCapitalEtb',
  'monthlyRevenueEtb',
  'annualRevenueLast3',
  'netProfitLast3',
  'financingRequiredEtb',
  'sourceOfRepayment',
  'purposeOfFunds',
  'guarantorFirstName',
  'guarantorFatherName',
  'guarantorGrandfatherName',
  'guarantorPhone',
  'guarantorMonthlyIncome',
  'creditHistory',
  'cbeAccountNumber',
  'cbeBranch',
  'cbeCity',
  'modeOfFinance',
  'collectedBy',
  'dateCollected',
  'createdAt',
];

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Escapes a CSV field according to RFC 4180.
 */
export function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

function formatValue(value: ApplicantSnapshot[keyof ApplicantSnapshot]): string {
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return escapeCsvField(String(value));
}

export function csvHeader(): string {
  return `${CSV_COLUMNS.map(toSnakeCase).join(',')}\n`;
}

export function csvRow(snapshot: ApplicantSnapshot): string {
  return `${CSV_COLUMNS.map((column) => formatValue(snapshot[column])).join(',')}\n`;
}
