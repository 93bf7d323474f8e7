import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RoleEnum } from './roles.enum';
import { ROLES_KEY } from './roles.decorator';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';

/**
 * Role gate evaluated before any compliance operation runs.
 *
 * The engine itself is role-agnostic; every permission check happens here
 * or in the application services, never in the domain services.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<RoleEnum[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!roles || roles.length === 0) {
      return true;
    }
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const userRole = request.user?.role;
    if (!userRole) {
      return false;
    }

    return roles.includes(userRole);
  }
}
