import {
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RecordCompletionDto {
  @ApiProperty({ example: 3 })
  @IsInt()
  courseId!: number;

  @ApiProperty({ example: '2024-01-01', description: 'Completion day (UTC)' })
  @IsISO8601({ strict: true })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'completedOn must be YYYY-MM-DD' })
  completedOn!: string;

  @ApiPropertyOptional({
    description: 'Opaque artifact-store key of the certificate',
    example: 'certificates/2024/e-1042-c1.pdf',
  })
  @IsString()
  @MaxLength(512)
  @IsOptional()
  certificateKey?: string;
}
