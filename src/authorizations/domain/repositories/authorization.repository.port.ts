import { NullableType } from '../../../utils/types/nullable.type';
import {
  Authorization,
  AuthorizationTransitionPatch,
  NewAuthorization,
} from '../entities/authorization.entity';
import { AuthorizationState } from '../enums/authorization-state.enum';

export interface AuthorizationFilter {
  personId?: number;
  facilityId?: number;
  state?: AuthorizationState;
}

export abstract class AuthorizationRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Authorization>>;

  /**
   * The pending or active record of the pair, if any
   */
  abstract findOpenForPair(
    personId: number,
    facilityId: number,
  ): Promise<NullableType<Authorization>>;

  /**
   * Most recently created record of the pair, in any state
   */
  abstract findLatestForPair(
    personId: number,
    facilityId: number,
  ): Promise<NullableType<Authorization>>;

  /**
   * Ascending id
   */
  abstract findByStates(
    states: AuthorizationState[],
  ): Promise<Authorization[]>;

  /**
   * Newest first
   */
  abstract list(filter: AuthorizationFilter): Promise<Authorization[]>;

  /**
   * Insert a pending record. Throws DuplicateRequestError when the pair
   * already has an open record.
   */
  abstract create(data: NewAuthorization): Promise<Authorization>;

  /**
   * Write `patch` only if the stored version still equals `expectedVersion`,
   * bumping the version. Returns null when the version moved on.
   */
  abstract transition(
    id: number,
    expectedVersion: number,
    patch: AuthorizationTransitionPatch,
  ): Promise<NullableType<Authorization>>;
}
