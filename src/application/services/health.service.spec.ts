import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import type { SequenceGenerator } from '@/domain/services';
import { SEQUENCE_GENERATOR } from '@/domain/services';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let service: HealthService;
  let mockDataSource: { query: jest.Mock };
  let mockSequence: jest.Mocked<SequenceGenerator>;

  beforeEach(async () => {
    mockDataSource = {
      query: jest.fn().mockResolvedValue([{ 1: 1 }]),
    };

    mockSequence = {
      next: jest.fn(),
      current: jest.fn().mockResolvedValue(42),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: DataSource, useValue: mockDataSource },
        { provide: SEQUENCE_GENERATOR, useValue: mockSequence },
      ],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  describe('check', () => {
    it('should return healthy when the database is available', async () => {
      const result = await service.check();

      expect(result.status).toBe('healthy');
      expect(result.database.status).toBe('healthy');
      expect(result.database.lastAutoNumber).toBe(42);
      expect(result.timestamp).toBeDefined();
    });

    it('should return unhealthy when the database query fails', async () => {
      mockDataSource.query.mockRejectedValue(new Error('SQLITE_CANTOPEN'));

      const result = await service.check();

      expect(result.status).toBe('unhealthy');
      expect(result.database.message).toBe('SQLITE_CANTOPEN');
    });

    it('should return unhealthy when the counter cannot be read', async () => {
      mockSequence.current.mockRejectedValue('disk I/O error');

      const result = await service.check();

      expect(result.status).toBe('unhealthy');
      expect(result.database.message).toBe('Database check failed');
    });

    it('should not draw a sequence value', async () => {
      await service.check();

      expect(mockSequence.next).not.toHaveBeenCalled();
    });
  });
});
