import { Column, Entity, PrimaryColumn } from 'typeorm';

/** One row per named counter; value is the last number handed out. */
@Entity('sequences')
export class SequenceEntity {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  name!: string;

  @Column({ type: 'integer', default: 0 })
  value!: number;
}
