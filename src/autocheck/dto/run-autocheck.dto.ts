import { IsInt, IsISO8601, IsOptional, Max, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RunAutocheckDto {
  @ApiPropertyOptional({
    description: 'Evaluate as of this day or instant (UTC). Defaults to now.',
    example: '2024-07-05',
  })
  @IsISO8601()
  @IsOptional()
  asOf?: string;

  @ApiPropertyOptional({ minimum: 1, maximum: 32, example: 4 })
  @IsInt()
  @Min(1)
  @Max(32)
  @IsOptional()
  concurrency?: number;
}
