import { ApiProperty } from '@nestjs/swagger';
import { Facility } from '../domain/entities/facility.entity';
import { Requirement } from '../domain/entities/requirement.entity';
import { RequirementResponseDto } from './requirement-response.dto';

export class FacilityResponseDto {
  @ApiProperty({ example: 2 })
  id!: number;

  @ApiProperty({ example: 'BSL2-A' })
  code!: string;

  @ApiProperty({ example: 'Building 4, Suite A' })
  name!: string;

  @ApiProperty({ type: [RequirementResponseDto] })
  requirements!: RequirementResponseDto[];

  static fromDomain(
    facility: Facility,
    requirements: Requirement[],
  ): FacilityResponseDto {
    const dto = new FacilityResponseDto();
    dto.id = facility.id;
    dto.code = facility.code;
    dto.name = facility.name;
    dto.requirements = requirements.map(RequirementResponseDto.fromDomain);
    return dto;
  }
}
