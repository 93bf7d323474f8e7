import { ApiProperty } from '@nestjs/swagger';
import { AuthorizationState } from '../../authorizations/domain/enums/authorization-state.enum';
import { ComplianceErrorCode } from '../../utils/errors/compliance-errors';
import {
  AutocheckFailure,
  AutocheckSummary,
  AutocheckTransition,
} from '../autocheck.types';

export class AutocheckTransitionDto implements AutocheckTransition {
  @ApiProperty({ example: 42 })
  authorizationId!: number;

  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ enum: AuthorizationState })
  from!: AuthorizationState;

  @ApiProperty({ enum: AuthorizationState })
  to!: AuthorizationState;

  @ApiProperty({ nullable: true, example: 'TrainingExpired(C1, expiredOn=2024-06-29)' })
  reason!: string | null;
}

export class AutocheckFailureDto implements AutocheckFailure {
  @ApiProperty({ example: 43 })
  authorizationId!: number;

  @ApiProperty({ enum: ComplianceErrorCode })
  code!: ComplianceErrorCode;

  @ApiProperty()
  message!: string;
}

export class AutocheckSummaryResponseDto implements AutocheckSummary {
  @ApiProperty({ format: 'uuid' })
  runId!: string;

  @ApiProperty({ example: '2024-07-05' })
  asOf!: string;

  @ApiProperty()
  startedAt!: Date;

  @ApiProperty()
  finishedAt!: Date;

  @ApiProperty()
  examined!: number;

  @ApiProperty({ type: [AutocheckTransitionDto] })
  granted!: AutocheckTransitionDto[];

  @ApiProperty({ type: [AutocheckTransitionDto] })
  revoked!: AutocheckTransitionDto[];

  @ApiProperty({ type: [AutocheckTransitionDto] })
  denied!: AutocheckTransitionDto[];

  @ApiProperty({ type: [Number] })
  unchanged!: number[];

  @ApiProperty({ type: [AutocheckFailureDto] })
  errors!: AutocheckFailureDto[];

  @ApiProperty({ type: [Number] })
  cancelled!: number[];

  @ApiProperty({ description: 'False when the run entry could not be appended' })
  runAudited!: boolean;

  static fromSummary(summary: AutocheckSummary): AutocheckSummaryResponseDto {
    return Object.assign(new AutocheckSummaryResponseDto(), summary);
  }
}
