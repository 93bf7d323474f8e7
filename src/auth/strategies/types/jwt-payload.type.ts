import { Request } from 'express';
import { RoleEnum } from '../../../roles/roles.enum';

/**
 * Claims this service relies on. Tokens are issued by the identity
 * service; `id` is the Person id the token was issued for.
 */
export type JwtPayloadType = {
  id: number;
  role: RoleEnum;
  iat?: number;
  exp?: number;
};

export type AuthenticatedRequest = Request & { user?: JwtPayloadType };
