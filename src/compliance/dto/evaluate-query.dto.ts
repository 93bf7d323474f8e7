import { IsInt, IsISO8601, IsOptional } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class EvaluateQueryDto {
  @ApiProperty({ example: 7 })
  @IsInt()
  @Type(() => Number)
  personId!: number;

  @ApiProperty({ example: 2 })
  @IsInt()
  @Type(() => Number)
  facilityId!: number;

  @ApiPropertyOptional({
    description: 'Day or instant to evaluate at (UTC). Defaults to now.',
    example: '2024-07-05',
  })
  @IsISO8601()
  @IsOptional()
  asOf?: string;
}
