import { plainToClass, ClassConstructor } from 'class-transformer';
import { validateSync } from 'class-validator';

/**
 * Validate environment variables against a decorated validator class.
 * Throws on the first invalid namespace so the app fails at boot.
 */
function validateConfig<T extends object>(
  config: Record<string, unknown>,
  envVariablesClass: ClassConstructor<T>,
): T {
  const validatedConfig = plainToClass(envVariablesClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}

export default validateConfig;
