import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AuthorizationDenied } from '@/domain/errors';
import { Applicant, ApplicantFields } from '@/domain/models';
import { ElevatedTrust } from '@/domain/policies';
import type { ElevatedApplicantRepository } from '@/domain/repositories';
import { ApplicantEntity } from '@/infrastructure/database/entities';
import { ApplicantMapper } from '@/infrastructure/database/mappers';
import { withStoreErrors } from '@/infrastructure/database/store-errors';

/**
 * TypeORM implementation of the administrative mutations.
 * Bypasses the access policy layer; the only gate is a genuine ElevatedTrust.
 */
@Injectable()
export class TypeOrmElevatedApplicantRepository implements ElevatedApplicantRepository {
  constructor(
    @InjectRepository(ApplicantEntity)
    private readonly repository: Repository<ApplicantEntity>,
  ) {}

  /** Rewrites the intake fields (and total_employees with them) in a single UPDATE. */
  async update(trust: ElevatedTrust, id: string, fields: ApplicantFields): Promise<Applicant | null> {
    this.assertTrusted(trust, 'update applicants');

    return withStoreErrors('applicants.update', async () => {
      await this.repository.update({ id }, ApplicantMapper.toColumns(fields));

      const entity = await this.repository.findOneBy({ id });
      return entity ? ApplicantMapper.toDomain(entity) : null;
    });
  }

  async remove(trust: ElevatedTrust, id: string): Promise<boolean> {
    this.assertTrusted(trust, 'delete applicants');

    const result = await withStoreErrors('applicants.remove', () => this.repository.delete({ id }));

    return (result.affected ?? 0) > 0;
  }

  private assertTrusted(trust: ElevatedTrust, operation: string): void {
    if (!ElevatedTrust.isGenuine(trust)) {
      throw new AuthorizationDenied(operation, 'Elevated trust is required');
    }
  }
}
