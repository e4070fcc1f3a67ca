import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { AuthorizationDenied } from '@/domain/errors';
import { Applicant } from '@/domain/models';
import { APPLICANT_ACCESS_POLICY, ApplicantAccessPolicy, CallerContext } from '@/domain/policies';
import type { ApplicantFilter, ApplicantRepository } from '@/domain/repositories';
import { APPLICANT_REPOSITORY } from '@/domain/repositories';
import type { ILogger, SequenceGenerator } from '@/domain/services';
import { LOGGER_SERVICE, SEQUENCE_GENERATOR } from '@/domain/services';
import {
  ApplicantResponseDto,
  CreateApplicantDto,
  PaginatedApplicantsResponseDto,
} from '@/application/dtos';
import { csvHeader, csvRow } from '@/application/export';
import { validateInput } from '@/application/validation';

export interface ListApplicantsOptions {
  filter?: ApplicantFilter;
  page?: number;
  limit?: number;
}

/**
 * Applicant store: policy-checked inserts and reads.
 * Nothing here can change or remove a stored record.
 */
@Injectable()
export class ApplicantService {
  constructor(
    @Inject(APPLICANT_REPOSITORY)
    private readonly applicantRepository: ApplicantRepository,
    @Inject(SEQUENCE_GENERATOR)
    private readonly sequence: SequenceGenerator,
    @Inject(APPLICANT_ACCESS_POLICY)
    private readonly policy: ApplicantAccessPolicy,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Validates and stores one intake record.
   *
   * The auto number is drawn before the insert runs; if the insert then fails,
   * that number is skipped for good.
   * @throws {ValidationError} On the first invalid field
   * @throws {AuthorizationDenied} When the insert predicate rejects the caller
   * @throws {ConstraintViolation} On a duplicate auto number
   * @throws {StoreUnavailable} When the database fails
   */
  async insert(caller: CallerContext, input: unknown): Promise<Applicant> {
    const dto = validateInput(CreateApplicantDto, input);
    const fields = CreateApplicantDto.toFields(dto, caller.userId);

    if (!this.policy.canInsert(caller, fields)) {
      this.logger.warn('Applicant insert refused by policy', { userId: caller.userId, role: caller.role });
      throw new AuthorizationDenied('insert applicants');
    }

    const autoNumber = await this.sequence.next();
    const applicant = await this.applicantRepository.insert({ ...fields, autoNumber });

    this.logger.log('Applicant stored', { id: applicant.id, autoNumber, batch: applicant.batch });

    return applicant;
  }

  /**
   * Lazily yields the records matching the filter that the caller may see,
   * ordered by auto number.
   */
  async *select(caller: CallerContext, filter: ApplicantFilter = {}): AsyncGenerator<Applicant, void, unknown> {
    for await (const applicant of this.applicantRepository.select(filter)) {
      if (this.policy.canSelect(caller, applicant)) {
        yield applicant;
      }
    }
  }

  /**
   * Retrieves a page of applicants. `total` counts filter matches before the select predicate.
   */
  async list(caller: CallerContext, options: ListApplicantsOptions = {}): Promise<PaginatedApplicantsResponseDto> {
    const { filter = {}, page = 1, limit = 10 } = options;

    this.logger.log('Fetching applicants', { page, limit });

    const { applicants, total } = await this.applicantRepository.findAll({ filter, page, limit });

    return {
      data: applicants
        .filter((applicant) => this.policy.canSelect(caller, applicant))
        .map(ApplicantResponseDto.fromModel),
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }

  /**
   * @throws {NotFoundException} When no visible record holds the number
   */
  async findByAutoNumber(caller: CallerContext, autoNumber: number): Promise<Applicant> {
    const applicant = await this.applicantRepository.findByAutoNumber(autoNumber);

    if (!applicant || !this.policy.canSelect(caller, applicant)) {
      throw new NotFoundException(`Applicant #${autoNumber} not found`);
    }

    return applicant;
  }

  /**
   * Exports visible applicants to CSV using streaming.
   * @yields CSV lines (header first, then one line per applicant)
   */
  async *exportCsv(caller: CallerContext, filter: ApplicantFilter = {}): AsyncGenerator<string, void, unknown> {
    this.logger.log('Exporting applicants to CSV', { ...filter });

    yield csvHeader();

    for await (const applicant of this.select(caller, filter)) {
      yield csvRow(applicant.toPlainObject());
    }
  }
}
