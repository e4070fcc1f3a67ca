import { Provider } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { APPLICANT_AUTONUMBER_SEQUENCE, SEQUENCE_GENERATOR } from '@/domain/services';
import { TypeOrmSequenceGenerator } from './typeorm-sequence.generator';

export const sequenceProviders: Provider[] = [
  {
    provide: SEQUENCE_GENERATOR,
    inject: [DataSource],
    useFactory: (dataSource: DataSource) =>
      new TypeOrmSequenceGenerator(dataSource, APPLICANT_AUTONUMBER_SEQUENCE),
  },
];
