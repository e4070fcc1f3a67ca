export const SEQUENCE_GENERATOR = Symbol('SEQUENCE_GENERATOR');

/** Name of the counter behind applicant auto numbers. */
export const APPLICANT_AUTONUMBER_SEQUENCE = 'applicant_autonum';

/**
 * Allocator for the human-facing applicant number.
 *
 * next() never returns the same value twice and each value is greater than every
 * value returned before it, whatever the number of concurrent callers. Values
 * handed to an insert that later fails are skipped, not reused.
 */
export interface SequenceGenerator {
  next(): Promise<number>;
  /** Last value handed out, or 0 if none. */
  current(): Promise<number>;
}
