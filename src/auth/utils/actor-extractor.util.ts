import { UnauthorizedException } from '@nestjs/common';
import { PersonActor } from '../domain/actor';
import { AuthenticatedRequest } from '../strategies/types/jwt-payload.type';

/**
 * Extract the acting person from a request authenticated by JwtStrategy.
 *
 * @param req - Express request with user from JWT
 * @returns Actor object with type, id and role
 */
export function extractActorFromRequest(req: AuthenticatedRequest): PersonActor {
  const personId = req.user?.id;
  const role = req.user?.role;

  if (!personId || !role) {
    throw new UnauthorizedException('Person ID or role not found in request');
  }

  return {
    type: 'person',
    id: Number(personId),
    role,
  };
}
