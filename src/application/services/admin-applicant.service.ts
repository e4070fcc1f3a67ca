import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { Applicant } from '@/domain/models';
import { ElevatedTrust } from '@/domain/policies';
import type { ApplicantRepository, ElevatedApplicantRepository } from '@/domain/repositories';
import { APPLICANT_REPOSITORY, ELEVATED_APPLICANT_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { CreateApplicantDto, UpdateApplicantDto } from '@/application/dtos';
import { validateInput } from '@/application/validation';

/**
 * Administrative changes to stored applicants. Every operation requires an
 * ElevatedTrust and bypasses the access policy layer.
 */
@Injectable()
export class AdminApplicantService {
  constructor(
    @Inject(APPLICANT_REPOSITORY)
    private readonly applicantRepository: ApplicantRepository,
    @Inject(ELEVATED_APPLICANT_REPOSITORY)
    private readonly elevatedRepository: ElevatedApplicantRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Applies a partial change. The merged record is validated as a whole and
   * totalEmployees is recomputed from the merged head counts.
   * @throws {ValidationError} When the patch or the merged record is invalid
   * @throws {NotFoundException} When the applicant doesn't exist
   */
  async update(trust: ElevatedTrust, id: string, patch: unknown): Promise<Applicant> {
    const changes = validateInput(UpdateApplicantDto, patch);

    const existing = await this.applicantRepository.findById(id);
    if (!existing) {
      throw new NotFoundException(`Applicant with id ${id} not found`);
    }

    const provided = Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined));
    const merged = validateInput(CreateApplicantDto, { ...existing.fields, ...provided });
    const fields = CreateApplicantDto.toFields(merged, existing.collectedBy);

    const updated = await this.elevatedRepository.update(trust, id, fields);
    if (!updated) {
      throw new NotFoundException(`Applicant with id ${id} not found`);
    }

    this.logger.log('Applicant updated', {
      id,
      subject: trust.subject,
      changed: Object.keys(provided),
    });

    return updated;
  }

  /**
   * @throws {NotFoundException} When the applicant doesn't exist
   */
  async remove(trust: ElevatedTrust, id: string): Promise<void> {
    const deleted = await this.elevatedRepository.remove(trust, id);

    if (!deleted) {
      throw new NotFoundException(`Applicant with id ${id} not found`);
    }

    this.logger.log('Applicant deleted', { id, subject: trust.subject });
  }
}
