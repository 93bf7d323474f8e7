import {
  IsDateString,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { AuditAction, AuditEntityType } from '../audit.service';

export class ListAuditEventsDto {
  @ApiPropertyOptional({ enum: AuditEntityType, example: 'authorization' })
  @IsEnum(AuditEntityType)
  @IsOptional()
  entityType?: AuditEntityType;

  @ApiPropertyOptional({ example: '42' })
  @IsString()
  @MaxLength(128)
  @IsOptional()
  entityId?: string;

  @ApiPropertyOptional({ enum: AuditAction, example: 'auto_revoke' })
  @IsEnum(AuditAction)
  @IsOptional()
  action?: AuditAction;

  @ApiPropertyOptional({ enum: ['person', 'system'] })
  @IsEnum(['person', 'system'])
  @IsOptional()
  actorType?: 'person' | 'system';

  @ApiPropertyOptional({ example: 7 })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  actorId?: number;

  @ApiPropertyOptional({
    description: 'Inclusive lower bound (ISO 8601)',
    example: '2024-07-01T00:00:00Z',
  })
  @IsDateString()
  @IsOptional()
  from?: string;

  @ApiPropertyOptional({
    description: 'Inclusive upper bound (ISO 8601)',
    example: '2024-07-31T23:59:59Z',
  })
  @IsDateString()
  @IsOptional()
  to?: string;

  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @IsOptional()
  page?: number;

  @ApiPropertyOptional({ default: 50, minimum: 1, maximum: 200 })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(200)
  @IsOptional()
  limit?: number;
}
