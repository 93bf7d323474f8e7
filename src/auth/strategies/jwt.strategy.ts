import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { RoleEnum } from '../../roles/roles.enum';

type IncomingClaims = {
  sub?: unknown;
  id?: unknown;
  role?: unknown;
  iat?: number;
  exp?: number;
};

const KNOWN_ROLES: readonly string[] = Object.values(RoleEnum);

function isRole(value: unknown): value is RoleEnum {
  return typeof value === 'string' && KNOWN_ROLES.includes(value);
}

/**
 * Verifies bearer tokens issued by the identity service. Token issuance and
 * credential checks happen there; this strategy only maps verified claims
 * to the request user.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(configService: ConfigService<AllConfigType>) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      issuer: configService.get('auth.jwtIssuer', { infer: true }),
      audience: configService.get('auth.jwtAudience', { infer: true }),
      algorithms: configService.get('auth.jwtAllowedAlgorithms', {
        infer: true,
      }),
    });
  }

  // Handles both `sub` and legacy `id` claims
  public validate(payload: IncomingClaims): JwtPayloadType {
    const personId = Number(payload.sub ?? payload.id);

    if (!Number.isInteger(personId) || personId <= 0) {
      throw new UnauthorizedException();
    }
    if (!isRole(payload.role)) {
      throw new UnauthorizedException();
    }

    return {
      id: personId,
      role: payload.role,
      iat: payload.iat,
      exp: payload.exp,
    };
  }
}
