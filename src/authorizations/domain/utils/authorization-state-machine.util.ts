import { AuthorizationState } from '../enums/authorization-state.enum';
import { IllegalTransitionError } from '../../../utils/errors/compliance-errors';

/**
 * Authorization State Machine Utility
 *
 * Valid Transitions:
 * - PENDING → ACTIVE (qualifying verdict or manual approval)
 * - PENDING → REVOKED (denial, auto-deny or cancelled request)
 * - ACTIVE → REVOKED (disqualifying verdict or manual revoke)
 * - REVOKED → PENDING (new request for the same person and facility; always a new record)
 *
 * Same-state transitions are no-ops.
 */
export class AuthorizationStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    AuthorizationState,
    AuthorizationState[]
  > = new Map([
    [
      AuthorizationState.PENDING,
      [AuthorizationState.ACTIVE, AuthorizationState.REVOKED],
    ],
    [AuthorizationState.ACTIVE, [AuthorizationState.REVOKED]],
    [AuthorizationState.REVOKED, [AuthorizationState.PENDING]],
  ]);

  static isValidTransition(
    from: AuthorizationState,
    to: AuthorizationState,
  ): boolean {
    if (from === to) {
      return true;
    }
    return this.VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
  }

  /**
   * @throws IllegalTransitionError if the transition is not allowed
   */
  static validateTransition(
    from: AuthorizationState,
    to: AuthorizationState,
  ): void {
    if (!this.isValidTransition(from, to)) {
      const targets = this.getValidTargetStates(from);
      throw new IllegalTransitionError(
        from,
        to,
        `Invalid state transition: ${from} → ${to}. ` +
          `Valid transitions from ${from}: ${targets.length ? targets.join(', ') : 'none'}`,
      );
    }
  }

  static getValidTargetStates(from: AuthorizationState): AuthorizationState[] {
    return [...(this.VALID_TRANSITIONS.get(from) ?? [])];
  }

  /**
   * Open records count against the one-per-pair rule.
   */
  static isOpen(state: AuthorizationState): boolean {
    return state !== AuthorizationState.REVOKED;
  }
}
