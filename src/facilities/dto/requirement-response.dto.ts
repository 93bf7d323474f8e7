import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Requirement } from '../domain/entities/requirement.entity';

export class RequirementResponseDto {
  @ApiProperty({ example: 5 })
  id!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ example: 3 })
  courseId!: number;

  @ApiPropertyOptional({ nullable: true, example: 180 })
  validityDays!: number | null;

  @ApiPropertyOptional({ nullable: true, example: null })
  graceDays!: number | null;

  static fromDomain(requirement: Requirement): RequirementResponseDto {
    const dto = new RequirementResponseDto();
    dto.id = requirement.id;
    dto.facilityId = requirement.facilityId;
    dto.courseId = requirement.courseId;
    dto.validityDays = requirement.validityDays;
    dto.graceDays = requirement.graceDays;
    return dto;
  }
}
