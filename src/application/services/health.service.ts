import { Inject, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type { SequenceGenerator } from '@/domain/services';
import { SEQUENCE_GENERATOR } from '@/domain/services';
import { ComponentHealthDto, HealthResponseDto } from '@/application/dtos/health-response.dto';

/** Timeout in milliseconds for each health check component */
const COMPONENT_TIMEOUT_MS = 3000;

/**
 * Health check service for liveness/readiness probes.
 */
@Injectable()
export class HealthService {
  constructor(
    private readonly dataSource: DataSource,
    @Inject(SEQUENCE_GENERATOR)
    private readonly sequence: SequenceGenerator,
  ) {}

  async check(): Promise<HealthResponseDto> {
    const database = await this.checkDatabase();

    return {
      status: database.status,
      timestamp: new Date().toISOString(),
      database,
    };
  }

  /** Checks SQLite connectivity and reads the applicant counter. */
  private async checkDatabase(): Promise<ComponentHealthDto> {
    const start = Date.now();
    try {
      await this.withTimeout(this.dataSource.query('SELECT 1'), COMPONENT_TIMEOUT_MS);
      const lastAutoNumber = await this.withTimeout(this.sequence.current(), COMPONENT_TIMEOUT_MS);

      return {
        status: 'healthy',
        latencyMs: Date.now() - start,
        lastAutoNumber,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        latencyMs: Date.now() - start,
        message: error instanceof Error ? error.message : 'Database check failed',
      };
    }
  }

  /** Rejects when `work` does not settle within `ms`. */
  private async withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), ms);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
