/**
 * INTEGRATION TEST - ElevatedApplicantRepository
 *
 * Administrative mutations against a real SQLite in-memory database,
 * and the capability check that guards them.
 */

import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { AuthorizationDenied } from '@/domain/errors';
import { ElevatedTrust } from '@/domain/policies';
import { ApplicantEntity } from '@/infrastructure/database/entities';
import { buildApplicantFields } from '@/testing';
import { TypeOrmApplicantRepository } from './applicant.repository';
import { TypeOrmElevatedApplicantRepository } from './elevated-applicant.repository';

describe('ElevatedApplicantRepository (Integration)', () => {
  let repository: TypeOrmElevatedApplicantRepository;
  let applicants: TypeOrmApplicantRepository;
  let dataSource: DataSource;
  let module: TestingModule;
  let ormRepository: Repository<ApplicantEntity>;
  let trust: ElevatedTrust;
  let forged: ElevatedTrust;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [ApplicantEntity],
          synchronize: true,
          logging: false,
          retryAttempts: 0,
        }),
        TypeOrmModule.forFeature([ApplicantEntity]),
      ],
      providers: [TypeOrmApplicantRepository, TypeOrmElevatedApplicantRepository],
    }).compile();

    repository = module.get<TypeOrmElevatedApplicantRepository>(TypeOrmElevatedApplicantRepository);
    applicants = module.get<TypeOrmApplicantRepository>(TypeOrmApplicantRepository);
    dataSource = module.get<DataSource>(DataSource);
    ormRepository = module.get<Repository<ApplicantEntity>>(getRepositoryToken(ApplicantEntity));

    const granted = ElevatedTrust.fromServiceKey('test-service-role-key', 'test-service-role-key');
    const lookalike: unknown = Object.create(ElevatedTrust.prototype);
    if (!granted || !(lookalike instanceof ElevatedTrust)) {
      throw new Error('Test capabilities could not be prepared');
    }
    trust = granted;
    forged = lookalike;
  }, 30000);

  beforeEach(async () => {
    await ormRepository.clear();
  });

  afterAll(async () => {
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
    await module?.close();
  }, 10000);

  describe('update', () => {
    it('should rewrite the fields and recompute total_employees', async () => {
      const stored = await applicants.insert({ ...buildApplicantFields(), autoNumber: 1 });

      const updated = await repository.update(
        trust,
        stored.id,
        buildApplicantFields({ maleEmployees: 10, cbeCity: 'Bahir Dar' }),
      );

      expect(updated?.totalEmployees).toBe(12);
      expect(updated?.fields.cbeCity).toBe('Bahir Dar');
      expect(updated?.autoNumber).toBe(1);
      const row = await ormRepository.findOneByOrFail({ id: stored.id });
      expect(row.totalEmployees).toBe(12);
    });

    it('should return null for an unknown id', async () => {
      const result = await repository.update(trust, '00000000-0000-4000-8000-000000000000', buildApplicantFields());

      expect(result).toBeNull();
    });

    it('should refuse a capability that was not minted from the service key', async () => {
      const stored = await applicants.insert({ ...buildApplicantFields(), autoNumber: 1 });

      await expect(repository.update(forged, stored.id, buildApplicantFields({ batch: 'B-99' }))).rejects.toThrow(
        AuthorizationDenied,
      );
      const row = await ormRepository.findOneByOrFail({ id: stored.id });
      expect(row.batch).toBe('B-01');
    });
  });

  describe('remove', () => {
    it('should delete the record', async () => {
      const stored = await applicants.insert({ ...buildApplicantFields(), autoNumber: 1 });

      expect(await repository.remove(trust, stored.id)).toBe(true);
      expect(await applicants.findById(stored.id)).toBeNull();
    });

    it('should return false when nothing matched', async () => {
      expect(await repository.remove(trust, '00000000-0000-4000-8000-000000000000')).toBe(false);
    });

    it('should refuse a forged capability', async () => {
      const stored = await applicants.insert({ ...buildApplicantFields(), autoNumber: 1 });

      await expect(repository.remove(forged, stored.id)).rejects.toThrow(AuthorizationDenied);
      expect(await ormRepository.count()).toBe(1);
    });
  });
});
