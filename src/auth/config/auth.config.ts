import { registerAs } from '@nestjs/config';
import { IsOptional, IsString } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  @IsString()
  AUTH_JWT_SECRET!: string;

  // JWT standards
  @IsString()
  @IsOptional()
  AUTH_JWT_ISSUER?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_AUDIENCE?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_ALLOWED_ALGORITHMS?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: env.AUTH_JWT_SECRET,
    jwtIssuer: env.AUTH_JWT_ISSUER,
    jwtAudience: env.AUTH_JWT_AUDIENCE,
    jwtAllowedAlgorithms: env.AUTH_JWT_ALLOWED_ALGORITHMS
      ? env.AUTH_JWT_ALLOWED_ALGORITHMS.split(',').map((a) => a.trim())
      : ['HS256'],
  };
});
