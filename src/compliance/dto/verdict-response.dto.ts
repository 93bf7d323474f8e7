import { ApiProperty } from '@nestjs/swagger';
import {
  Deficiency,
  GraceNotice,
  Verdict,
} from '../domain/types/verdict.types';
import { formatDeficiency } from '../domain/utils/deficiency-formatter.util';

export class DeficiencyResponseDto {
  @ApiProperty({
    enum: ['NoTraining', 'TrainingExpired', 'DocumentNotAcknowledged'],
  })
  kind!: Deficiency['kind'];

  @ApiProperty({ example: 'TrainingExpired(C1, expiredOn=2024-06-29)' })
  summary!: string;

  @ApiProperty({ type: Object })
  detail!: Deficiency;
}

export class GraceNoticeResponseDto {
  @ApiProperty({ example: 'C1' })
  courseCode!: string;

  @ApiProperty({ example: '2024-06-29' })
  expiredOn!: string;

  @ApiProperty({ example: '2024-07-29' })
  graceEndsOn!: string;
}

export class VerdictResponseDto {
  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ example: '2024-07-05' })
  asOf!: string;

  @ApiProperty()
  qualified!: boolean;

  @ApiProperty({ type: [DeficiencyResponseDto] })
  reasons!: DeficiencyResponseDto[];

  @ApiProperty({ type: [GraceNoticeResponseDto] })
  graceInEffect!: GraceNoticeResponseDto[];

  static fromDomain(
    personId: number,
    facilityId: number,
    verdict: Verdict,
  ): VerdictResponseDto {
    const dto = new VerdictResponseDto();
    dto.personId = personId;
    dto.facilityId = facilityId;
    dto.asOf = verdict.asOf;
    dto.qualified = verdict.qualified;
    dto.reasons = verdict.reasons.map((deficiency) => ({
      kind: deficiency.kind,
      summary: formatDeficiency(deficiency),
      detail: deficiency,
    }));
    dto.graceInEffect = verdict.graceInEffect.map((notice: GraceNotice) => ({
      courseCode: notice.course.code,
      expiredOn: notice.expiredOn,
      graceEndsOn: notice.graceEndsOn,
    }));
    return dto;
  }
}
