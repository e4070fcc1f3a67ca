export { LOGGER_SERVICE } from './logger.interface';
export type { ILogger, LogContext } from './logger.interface';

export { APPLICANT_AUTONUMBER_SEQUENCE, SEQUENCE_GENERATOR } from './sequence-generator.interface';
export type { SequenceGenerator } from './sequence-generator.interface';
