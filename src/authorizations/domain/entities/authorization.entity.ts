import { AuthorizationState } from '../enums/authorization-state.enum';
import { ActorType } from '../../../auth/domain/actor';

/**
 * Domain entity for Authorization
 *
 * At most one record per (person, facility) is pending or active at a time.
 * Revoked records are kept; re-requesting after a revocation creates a new
 * record linked through `previousAuthorizationId`.
 *
 * `version` increases by one on every transition and is the compare-and-swap
 * token for writes.
 */
export interface Authorization {
  id: number;
  personId: number;
  facilityId: number;
  state: AuthorizationState;
  version: number;

  requestedAt: Date;
  requestedById: number;

  activatedAt: Date | null;
  activatedByType: ActorType | null;
  activatedById: number | null;

  revokedAt: Date | null;
  revokedByType: ActorType | null;
  revokedById: number | null;
  revocationReason: string | null;

  // Approved by a person despite a disqualifying verdict
  manualOverride: boolean;
  decisionNotes: string | null;
  previousAuthorizationId: number | null;
}

export type NewAuthorization = Pick<
  Authorization,
  | 'personId'
  | 'facilityId'
  | 'requestedAt'
  | 'requestedById'
  | 'previousAuthorizationId'
>;

/**
 * Fields a transition may write. `state` is always written.
 */
export type AuthorizationTransitionPatch = Pick<Authorization, 'state'> &
  Partial<
    Pick<
      Authorization,
      | 'activatedAt'
      | 'activatedByType'
      | 'activatedById'
      | 'revokedAt'
      | 'revokedByType'
      | 'revokedById'
      | 'revocationReason'
      | 'manualOverride'
      | 'decisionNotes'
    >
  >;
