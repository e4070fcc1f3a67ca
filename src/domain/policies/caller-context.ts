import { UserRole } from '../models/user.model';

/**
 * Identity of whoever issues a store operation.
 * Both fields are null for callers that could not be matched to a stored user.
 */
export interface CallerContext {
  readonly userId: string | null;
  readonly role: UserRole | null;
}

export const ANONYMOUS_CALLER: CallerContext = Object.freeze({ userId: null, role: null });
