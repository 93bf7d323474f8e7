import { registerAs } from '@nestjs/config';
import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { ComplianceConfig } from './compliance-config.type';

class EnvironmentVariablesValidator {
  @IsBoolean()
  @IsOptional()
  COMPLIANCE_AUTO_DENY_ON_AUTOCHECK?: boolean;

  @IsInt()
  @Min(1)
  @Max(32)
  @IsOptional()
  COMPLIANCE_AUTOCHECK_CONCURRENCY?: number;

  @IsBoolean()
  @IsOptional()
  COMPLIANCE_AUTOCHECK_ENABLED?: boolean;

  @IsInt()
  @Min(0)
  @Max(365)
  @IsOptional()
  COMPLIANCE_EXPIRING_WINDOW_DAYS?: number;
}

export default registerAs<ComplianceConfig>('compliance', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    // Pending requests stay pending unless this is switched on
    autoDenyOnAutocheck: process.env.COMPLIANCE_AUTO_DENY_ON_AUTOCHECK === 'true',
    autocheckConcurrency: process.env.COMPLIANCE_AUTOCHECK_CONCURRENCY
      ? parseInt(process.env.COMPLIANCE_AUTOCHECK_CONCURRENCY, 10)
      : 4,
    autocheckEnabled: process.env.COMPLIANCE_AUTOCHECK_ENABLED !== 'false',
    expiringWindowDays: process.env.COMPLIANCE_EXPIRING_WINDOW_DAYS
      ? parseInt(process.env.COMPLIANCE_EXPIRING_WINDOW_DAYS, 10)
      : 30,
  };
});
