import { RoleEnum } from '../../roles/roles.enum';

/**
 * A human acting through the API. Role is taken from the verified token.
 */
export interface PersonActor {
  type: 'person';
  id: number;
  role: RoleEnum;
}

/**
 * The scheduled/batch compliance sweep.
 */
export interface SystemActor {
  type: 'system';
  id: 'autocheck';
}

export type Actor = PersonActor | SystemActor;

export type ActorType = Actor['type'];

export const AUTOCHECK_ACTOR: SystemActor = Object.freeze({
  type: 'system',
  id: 'autocheck',
});

export function isAutocheckActor(actor: Actor): actor is SystemActor {
  return actor.type === 'system' && actor.id === 'autocheck';
}

/**
 * Person id for person actors, null for the system actor. This is what the
 * `*_by_id` columns store.
 */
export function actorPersonId(actor: Actor): number | null {
  return actor.type === 'person' ? actor.id : null;
}

export function describeActor(actor: Actor): string {
  return `${actor.type}:${actor.id}`;
}
