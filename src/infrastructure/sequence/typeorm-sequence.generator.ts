import { DataSource } from 'typeorm';
import { StoreUnavailable } from '@/domain/errors';
import type { SequenceGenerator } from '@/domain/services';
import { withStoreErrors } from '@/infrastructure/database/store-errors';

/**
 * Creates the counter row on first use and increments it otherwise, returning the new value.
 * One statement, so the read-modify-write is atomic in the database.
 */
const NEXT_VALUE_SQL = `
  INSERT INTO "sequences" ("name", "value") VALUES (?, 1)
  ON CONFLICT ("name") DO UPDATE SET "value" = "sequences"."value" + 1
  RETURNING "value"
`;

const CURRENT_VALUE_SQL = `SELECT "value" FROM "sequences" WHERE "name" = ?`;

interface SequenceRow {
  value: number | string;
}

function isSequenceRow(row: unknown): row is SequenceRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'value' in row &&
    (typeof row.value === 'number' || typeof row.value === 'string')
  );
}

/**
 * Sequence generator backed by a row of the `sequences` table.
 *
 * Allocation runs in its own statement, outside any insert that consumes the value,
 * so a failed insert leaves a gap instead of releasing the number.
 */
export class TypeOrmSequenceGenerator implements SequenceGenerator {
  constructor(
    private readonly dataSource: DataSource,
    private readonly sequenceName: string,
  ) {}

  async next(): Promise<number> {
    const rows = await withStoreErrors<unknown>(`sequence.next(${this.sequenceName})`, () =>
      this.dataSource.query(NEXT_VALUE_SQL, [this.sequenceName]),
    );

    const value = this.readValue(rows);
    if (value === null) {
      throw new StoreUnavailable(`sequence.next(${this.sequenceName})`, new Error('No value returned'));
    }
    return value;
  }

  async current(): Promise<number> {
    const rows = await withStoreErrors<unknown>(`sequence.current(${this.sequenceName})`, () =>
      this.dataSource.query(CURRENT_VALUE_SQL, [this.sequenceName]),
    );

    return this.readValue(rows) ?? 0;
  }

  private readValue(rows: unknown): number | null {
    if (!Array.isArray(rows) || rows.length === 0) {
      return null;
    }

    const [row]: unknown[] = rows;
    return isSequenceRow(row) ? Number(row.value) : null;
  }
}
