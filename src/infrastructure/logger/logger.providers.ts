import { INQUIRER } from '@nestjs/core';
import { Provider, Scope } from '@nestjs/common';
import { LOGGER_SERVICE } from '@/domain/services';
import { LoggerService } from './custom-logger.service';

/**
 * Binds LOGGER_SERVICE to LoggerService.
 * Transient: each consumer gets its own instance, labelled with the consumer's class name.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    inject: [INQUIRER],
    useFactory: (inquirer: object | undefined) => new LoggerService(inquirer?.constructor.name ?? ''),
    scope: Scope.TRANSIENT,
  },
];
