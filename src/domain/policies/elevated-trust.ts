import { timingSafeEqual } from 'node:crypto';

const issued = new WeakSet<ElevatedTrust>();

/**
 * Capability for the administrative path that bypasses the access policy layer.
 *
 * It is not a role: instances can only be minted from the service role key, and
 * the mutating repository methods refuse anything that was not minted here.
 */
export class ElevatedTrust {
  private constructor(
    readonly subject: string,
    readonly grantedAt: Date,
  ) {}

  /**
   * @param presented - Key supplied by the caller
   * @param expected - Configured service role key; when absent nothing is ever granted
   * @returns The capability, or null when the keys do not match
   */
  static fromServiceKey(
    presented: string | undefined,
    expected: string | undefined,
    now: Date = new Date(),
  ): ElevatedTrust | null {
    if (!presented || !expected) {
      return null;
    }

    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    if (a.length !== b.length || !timingSafeEqual(a, b)) {
      return null;
    }

    const trust = new ElevatedTrust('service_role', now);
    issued.add(trust);
    return trust;
  }

  static isGenuine(value: unknown): value is ElevatedTrust {
    return value instanceof ElevatedTrust && issued.has(value);
  }
}
