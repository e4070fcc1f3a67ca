import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { Applicant } from '@/domain/models';
import type {
  ApplicantFilter,
  ApplicantRepository,
  FindAllOptions,
  FindAllResult,
  InsertApplicantData,
} from '@/domain/repositories';
import { ApplicantEntity } from '@/infrastructure/database/entities';
import { ApplicantMapper } from '@/infrastructure/database/mappers';
import { withStoreErrors } from '@/infrastructure/database/store-errors';

const SELECT_BATCH_SIZE = 500;

/**
 * TypeORM implementation of the standard applicant store.
 * Every write is a single INSERT, which the database applies atomically.
 */
@Injectable()
export class TypeOrmApplicantRepository implements ApplicantRepository {
  constructor(
    @InjectRepository(ApplicantEntity)
    private readonly repository: Repository<ApplicantEntity>,
  ) {}

  async insert(data: InsertApplicantData): Promise<Applicant> {
    const id = randomUUID();

    return withStoreErrors('applicants.insert', async () => {
      await this.repository.insert({
        ...ApplicantMapper.toColumns(data),
        id,
        autoNumber: data.autoNumber,
      });

      const saved = await this.repository.findOneByOrFail({ id });
      return ApplicantMapper.toDomain(saved);
    });
  }

  async findById(id: string): Promise<Applicant | null> {
    const entity = await withStoreErrors('applicants.findById', () => this.repository.findOneBy({ id }));

    return entity ? ApplicantMapper.toDomain(entity) : null;
  }

  async findByAutoNumber(autoNumber: number): Promise<Applicant | null> {
    const entity = await withStoreErrors('applicants.findByAutoNumber', () =>
      this.repository.findOneBy({ autoNumber }),
    );

    return entity ? ApplicantMapper.toDomain(entity) : null;
  }

  /** Returns one page ordered by autoNumber, with the total count of matches. */
  async findAll(options: FindAllOptions = {}): Promise<FindAllResult> {
    const { filter = {}, page = 1, limit = 10 } = options;

    const qb = this.applyFilter(this.repository.createQueryBuilder('applicant'), filter)
      .orderBy('applicant.autoNumber', 'ASC')
      .skip((page - 1) * limit)
      .take(limit);

    const [entities, total] = await withStoreErrors('applicants.findAll', () => qb.getManyAndCount());

    return {
      applicants: entities.map((entity) => ApplicantMapper.toDomain(entity)),
      total,
    };
  }

  /** Streams matching records using keyset pagination on autoNumber. */
  async *select(filter: ApplicantFilter = {}): AsyncGenerator<Applicant, void, unknown> {
    let lastAutoNumber = 0;

    while (true) {
      const qb = this.applyFilter(this.repository.createQueryBuilder('applicant'), filter)
        .andWhere('applicant.autoNumber > :lastAutoNumber', { lastAutoNumber })
        .orderBy('applicant.autoNumber', 'ASC')
        .take(SELECT_BATCH_SIZE);

      const batch = await withStoreErrors('applicants.select', () => qb.getMany());

      if (batch.length === 0) {
        break;
      }

      for (const entity of batch) {
        yield ApplicantMapper.toDomain(entity);
      }

      lastAutoNumber = batch[batch.length - 1].autoNumber;
    }
  }

  private applyFilter(
    qb: SelectQueryBuilder<ApplicantEntity>,
    filter: ApplicantFilter,
  ): SelectQueryBuilder<ApplicantEntity> {
    qb.where('1 = 1');

    const equalities = {
      region: filter.region,
      zone: filter.zone,
      woreda: filter.woreda,
      kebele: filter.kebele,
      batch: filter.batch,
      collectedBy: filter.collectedBy,
    };

    for (const [column, value] of Object.entries(equalities)) {
      if (value !== undefined) {
        qb.andWhere(`applicant.${column} = :${column}`, { [column]: value });
      }
    }

    if (filter.dateCollectedFrom) {
      qb.andWhere('applicant.dateCollected >= :dateCollectedFrom', {
        dateCollectedFrom: filter.dateCollectedFrom,
      });
    }

    if (filter.dateCollectedTo) {
      qb.andWhere('applicant.dateCollected <= :dateCollectedTo', {
        dateCollectedTo: filter.dateCollectedTo,
      });
    }

    return qb;
  }
}
