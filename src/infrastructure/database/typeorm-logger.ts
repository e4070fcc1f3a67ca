import { Logger } from 'typeorm';
import { LoggerService } from '../logger';

const withParameters = (parameters?: unknown[]) => (parameters?.length ? { parameters } : {});

/** Routes TypeORM query logging through the application logger. */
export class TypeOrmLogger implements Logger {
  private readonly logger = new LoggerService('Database');

  logQuery(query: string, parameters?: unknown[]) {
    this.logger.debug(query, withParameters(parameters));
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]) {
    this.logger.error(typeof error === 'string' ? error : error.message, {
      query,
      ...withParameters(parameters),
    });
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[]) {
    this.logger.warn(`Slow query (${time}ms)`, { query, ...withParameters(parameters) });
  }

  logSchemaBuild(message: string) {
    this.logger.log(message);
  }

  logMigration(message: string) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    if (level === 'warn') {
      this.logger.warn(String(message));
    } else {
      this.logger.log(String(message));
    }
  }
}
