import { Applicant, ApplicantFields } from '@/domain/models';
import { ElevatedTrust } from '@/domain/policies';

export interface ApplicantFilter {
  region?: string;
  zone?: string;
  woreda?: string;
  kebele?: string;
  batch?: string;
  collectedBy?: string;
  /** Inclusive lower bound on dateCollected (YYYY-MM-DD) */
  dateCollectedFrom?: string;
  /** Inclusive upper bound on dateCollected (YYYY-MM-DD) */
  dateCollectedTo?: string;
}

export interface FindAllOptions {
  filter?: ApplicantFilter;
  page?: number;
  limit?: number;
}

export interface FindAllResult {
  applicants: Applicant[];
  total: number;
}

export interface InsertApplicantData extends ApplicantFields {
  autoNumber: number;
}

export const APPLICANT_REPOSITORY = Symbol('APPLICANT_REPOSITORY');

/**
 * Standard applicant store operations. No method here can change an existing row.
 */
export interface ApplicantRepository {
  /**
   * Persists one record in a single statement. totalEmployees is computed by the implementation.
   * @throws {ConstraintViolation} On a duplicate auto number
   * @throws {StoreUnavailable} On any other storage failure
   */
  insert(data: InsertApplicantData): Promise<Applicant>;
  findById(id: string): Promise<Applicant | null>;
  findByAutoNumber(autoNumber: number): Promise<Applicant | null>;
  /** Page of records ordered by autoNumber ascending. */
  findAll(options?: FindAllOptions): Promise<FindAllResult>;
  /** Lazily walks matching records by ascending autoNumber. */
  select(filter?: ApplicantFilter): AsyncGenerator<Applicant, void, unknown>;
}

export const ELEVATED_APPLICANT_REPOSITORY = Symbol('ELEVATED_APPLICANT_REPOSITORY');

/**
 * Mutations reserved for the administrative path. Every call must carry an
 * ElevatedTrust minted from the service role key.
 */
export interface ElevatedApplicantRepository {
  /** Replaces the intake fields of a record; returns null if it does not exist. */
  update(trust: ElevatedTrust, id: string, fields: ApplicantFields): Promise<Applicant | null>;
  remove(trust: ElevatedTrust, id: string): Promise<boolean>;
}
