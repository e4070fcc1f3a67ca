import type { Applicant, ApplicantFields } from '../models';
import { UserRole } from '../models/user.model';
import type { CallerContext } from './caller-context';

export const APPLICANT_ACCESS_POLICY = Symbol('APPLICANT_ACCESS_POLICY');

/**
 * Row-level predicates evaluated by the applicant store before it touches storage.
 * Implementations must be pure: same caller and row, same answer.
 *
 * Update and delete have no predicate here; they only exist on the elevated-trust path.
 */
export interface ApplicantAccessPolicy {
  canInsert(caller: CallerContext, row: ApplicantFields): boolean;
  canSelect(caller: CallerContext, row: Applicant): boolean;
}

/** Any caller may insert and read any row. */
export class OpenApplicantPolicy implements ApplicantAccessPolicy {
  canInsert(): boolean {
    return true;
  }

  canSelect(): boolean {
    return true;
  }
}

/**
 * Restricts inserts to the given roles; reads stay open.
 * Anonymous callers never satisfy the insert predicate.
 */
export class RoleScopedApplicantPolicy implements ApplicantAccessPolicy {
  constructor(private readonly insertRoles: readonly UserRole[]) {}

  canInsert(caller: CallerContext): boolean {
    return caller.role !== null && this.insertRoles.includes(caller.role);
  }

  canSelect(): boolean {
    return true;
  }
}
