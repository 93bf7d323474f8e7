import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AuditEntry } from '../domain/entities/audit-entry.entity';

export class AuditEventResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: '2024-07-01T02:00:00.000Z' })
  occurredAt!: Date;

  @ApiProperty({ enum: ['person', 'system'], example: 'system' })
  actorType!: 'person' | 'system';

  @ApiPropertyOptional({
    description: 'Person id; null when the autocheck sweep acted',
    nullable: true,
    example: null,
  })
  actorId!: number | null;

  @ApiProperty({ example: 'authorization' })
  entityType!: string;

  @ApiProperty({ example: '42' })
  entityId!: string;

  @ApiProperty({ example: 'auto_revoke' })
  action!: string;

  @ApiPropertyOptional({ nullable: true, example: 'active' })
  priorState!: string | null;

  @ApiPropertyOptional({ nullable: true, example: 'revoked' })
  newState!: string | null;

  @ApiPropertyOptional({
    nullable: true,
    example: 'TrainingExpired(C1, expiredOn=2024-06-29)',
  })
  detail!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Object })
  metadata!: Record<string, unknown> | null;

  static fromDomain(entry: AuditEntry): AuditEventResponseDto {
    const dto = new AuditEventResponseDto();
    dto.id = entry.id;
    dto.occurredAt = entry.occurredAt;
    dto.actorType = entry.actorType;
    dto.actorId = entry.actorId;
    dto.entityType = entry.entityType;
    dto.entityId = entry.entityId;
    dto.action = entry.action;
    dto.priorState = entry.priorState;
    dto.newState = entry.newState;
    dto.detail = entry.detail;
    dto.metadata = entry.metadata ? { ...entry.metadata } : null;
    return dto;
  }
}
