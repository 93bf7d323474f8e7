import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ManualDecisionDto {
  @ApiProperty({ description: 'true approves, false denies', example: true })
  @IsBoolean()
  approve!: boolean;

  @ApiPropertyOptional({ example: 'Supervised entry agreed with facility lead' })
  @IsString()
  @MaxLength(1000)
  @IsOptional()
  notes?: string;
}
