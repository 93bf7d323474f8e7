export enum AuthorizationState {
  PENDING = 'pending', // requested, awaiting a qualifying verdict or a manual decision
  ACTIVE = 'active', // person may enter the facility
  REVOKED = 'revoked', // terminal for the record; a new request opens a new record
}
