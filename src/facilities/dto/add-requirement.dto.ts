import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AddRequirementDto {
  @ApiProperty({ example: 3 })
  @IsInt()
  courseId!: number;

  @ApiPropertyOptional({ description: 'Overrides the course validity', example: 180 })
  @IsInt()
  @Min(1)
  @Max(3650)
  @IsOptional()
  validityDays?: number;

  @ApiPropertyOptional({ description: 'Overrides the course grace', example: 0 })
  @IsInt()
  @Min(0)
  @Max(365)
  @IsOptional()
  graceDays?: number;
}
