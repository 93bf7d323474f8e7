import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AuthorizationResponseDto } from './authorization-response.dto';
import { ManualDecisionOutcome } from '../domain/services/authorization.domain.service';
import { formatDeficiency } from '../../compliance/domain/utils/deficiency-formatter.util';

export class ManualDecisionResponseDto {
  @ApiProperty({ type: AuthorizationResponseDto })
  authorization!: AuthorizationResponseDto;

  @ApiPropertyOptional({
    description: 'Verdict at decision time; null when it could not be computed',
    nullable: true,
  })
  qualified!: boolean | null;

  @ApiProperty({ type: [String], example: ['NoTraining(C2)'] })
  deficiencies!: string[];

  @ApiPropertyOptional({
    description: 'Recorded reason when denied',
    nullable: true,
    example: 'NoTraining(C2)',
  })
  reason!: string | null;

  @ApiPropertyOptional({
    nullable: true,
    example: 'Requirement 4 of facility 2 references missing course 9',
  })
  evaluationError!: string | null;

  static fromOutcome(outcome: ManualDecisionOutcome): ManualDecisionResponseDto {
    const dto = new ManualDecisionResponseDto();
    dto.authorization = AuthorizationResponseDto.fromDomain(outcome.authorization);
    dto.qualified = outcome.verdict ? outcome.verdict.qualified : null;
    dto.deficiencies = outcome.verdict
      ? outcome.verdict.reasons.map(formatDeficiency)
      : [];
    dto.reason = outcome.reason;
    dto.evaluationError = outcome.evaluationError;
    return dto;
  }
}
