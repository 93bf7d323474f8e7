import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateCourseDto {
  @ApiProperty({ example: 'C1' })
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]+$/)
  @MaxLength(64)
  code!: string;

  @ApiProperty({ example: 'Biosafety Level 2 Practices' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ description: 'Default validity in days', example: 365 })
  @IsInt()
  @Min(1)
  @Max(3650)
  validityDays!: number;

  @ApiPropertyOptional({ description: 'Default grace in days', example: 30, default: 0 })
  @IsInt()
  @Min(0)
  @Max(365)
  @IsOptional()
  graceDays?: number;
}
