import { IsInt, IsISO8601, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class ComplianceStatusQueryDto {
  @ApiPropertyOptional({ example: '2024-07-05' })
  @IsISO8601()
  @IsOptional()
  asOf?: string;

  @ApiPropertyOptional({ example: 2 })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  facilityId?: number;
}

export class ExpiringTrainingQueryDto {
  @ApiPropertyOptional({ example: '2024-06-01' })
  @IsISO8601()
  @IsOptional()
  asOf?: string;

  @ApiPropertyOptional({
    description: 'Look-ahead in days. Defaults to COMPLIANCE_EXPIRING_WINDOW_DAYS.',
    example: 30,
  })
  @IsInt()
  @Type(() => Number)
  @Min(0)
  @Max(365)
  @IsOptional()
  windowDays?: number;
}

export class AcknowledgmentReportQueryDto {
  @ApiPropertyOptional({ example: 2 })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  facilityId?: number;
}
