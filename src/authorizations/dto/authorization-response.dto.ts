import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Authorization } from '../domain/entities/authorization.entity';
import { AuthorizationState } from '../domain/enums/authorization-state.enum';

/**
 * Authorization Response DTO
 *
 * `*ByType` is `person` or `system`; `*ById` is null when the autocheck
 * sweep made the change.
 */
export class AuthorizationResponseDto {
  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ enum: AuthorizationState, example: AuthorizationState.ACTIVE })
  state!: AuthorizationState;

  @ApiProperty({ example: 2 })
  version!: number;

  @ApiProperty()
  requestedAt!: Date;

  @ApiProperty({ example: 7 })
  requestedById!: number;

  @ApiPropertyOptional({ nullable: true })
  activatedAt!: Date | null;

  @ApiPropertyOptional({ enum: ['person', 'system'], nullable: true })
  activatedByType!: 'person' | 'system' | null;

  @ApiPropertyOptional({ nullable: true })
  activatedById!: number | null;

  @ApiPropertyOptional({ nullable: true })
  revokedAt!: Date | null;

  @ApiPropertyOptional({ enum: ['person', 'system'], nullable: true })
  revokedByType!: 'person' | 'system' | null;

  @ApiPropertyOptional({ nullable: true })
  revokedById!: number | null;

  @ApiPropertyOptional({
    nullable: true,
    example: 'TrainingExpired(C1, expiredOn=2024-06-29)',
  })
  revocationReason!: string | null;

  @ApiProperty({ example: false })
  manualOverride!: boolean;

  @ApiPropertyOptional({ nullable: true })
  decisionNotes!: string | null;

  @ApiPropertyOptional({ nullable: true, example: 31 })
  previousAuthorizationId!: number | null;

  static fromDomain(authorization: Authorization): AuthorizationResponseDto {
    const dto = new AuthorizationResponseDto();
    Object.assign(dto, authorization);
    return dto;
  }
}
