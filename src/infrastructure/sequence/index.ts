export { sequenceProviders } from './sequence.providers';
export { TypeOrmSequenceGenerator } from './typeorm-sequence.generator';
