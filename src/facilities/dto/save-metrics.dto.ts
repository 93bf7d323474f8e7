import {
  IsInt,
  IsISO8601,
  IsOptional,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class SaveMetricsDto {
  @ApiProperty({ description: 'Percent; clamped to 0..100', example: 62 })
  @IsInt()
  utilization!: number;

  @ApiProperty({ description: 'Percent; clamped to 0..100', example: 91 })
  @IsInt()
  condition!: number;

  @ApiProperty({ description: 'Percent; clamped to 0..100', example: 74 })
  @IsInt()
  activity!: number;

  @ApiPropertyOptional({ example: '2024-07-05', description: 'Defaults to today (UTC)' })
  @IsISO8601({ strict: true })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'asOf must be YYYY-MM-DD' })
  @IsOptional()
  asOf?: string;
}

export class MetricsHistoryQueryDto {
  @ApiPropertyOptional({ example: 30 })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(366)
  @IsOptional()
  limit?: number;
}
