import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AuthorizationState } from '../../authorizations/domain/enums/authorization-state.enum';

export class ComplianceStatusRowDto {
  @ApiProperty({ example: 42 })
  authorizationId!: number;

  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ enum: AuthorizationState })
  state!: AuthorizationState;

  @ApiProperty()
  compliantNow!: boolean;

  @ApiProperty({ type: [String], example: ['NoTraining(C2)'] })
  reasons!: string[];

  @ApiProperty({ type: [String], example: ['C1'] })
  graceInEffect!: string[];

  @ApiPropertyOptional({
    nullable: true,
    description: 'Set when the record could not be evaluated',
  })
  error!: string | null;
}

export class ComplianceStatusReportDto {
  @ApiProperty({ example: '2024-07-05' })
  asOf!: string;

  @ApiProperty({ type: [ComplianceStatusRowDto] })
  rows!: ComplianceStatusRowDto[];
}

export class ExpiringTrainingRowDto {
  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 3 })
  courseId!: number;

  @ApiProperty({ example: 'C1' })
  courseCode!: string;

  @ApiProperty({ example: '2024-01-01' })
  completedOn!: string;

  @ApiProperty({ example: '2024-06-29' })
  expiresOn!: string;

  @ApiProperty({ example: '2024-06-29' })
  graceEndsOn!: string;

  @ApiProperty({ description: 'Negative once expired', example: 28 })
  daysLeft!: number;
}

export class ExpiringTrainingReportDto {
  @ApiProperty({ example: '2024-06-01' })
  asOf!: string;

  @ApiProperty({ example: 30 })
  windowDays!: number;

  @ApiProperty({ type: [ExpiringTrainingRowDto] })
  rows!: ExpiringTrainingRowDto[];
}

export class AcknowledgmentRowDto {
  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 'Ada Byrne' })
  personName!: string;

  @ApiProperty({ example: 5 })
  documentId!: number;

  @ApiProperty({ example: 'Cleanroom gowning SOP' })
  title!: string;

  @ApiPropertyOptional({ nullable: true, example: 2 })
  facilityId!: number | null;

  @ApiProperty({ example: 3 })
  version!: number;

  @ApiProperty({ type: Date })
  acknowledgedAt!: Date;
}

export class AcknowledgmentReportDto {
  @ApiProperty({ type: [AcknowledgmentRowDto] })
  rows!: AcknowledgmentRowDto[];
}
