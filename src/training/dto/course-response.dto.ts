import { ApiProperty } from '@nestjs/swagger';
import { Course } from '../domain/entities/course.entity';

export class CourseResponseDto {
  @ApiProperty({ example: 3 })
  id!: number;

  @ApiProperty({ example: 'C1' })
  code!: string;

  @ApiProperty({ example: 'Biosafety Level 2 Practices' })
  name!: string;

  @ApiProperty({ example: 365 })
  validityDays!: number;

  @ApiProperty({ example: 30 })
  graceDays!: number;

  static fromDomain(course: Course): CourseResponseDto {
    const dto = new CourseResponseDto();
    dto.id = course.id;
    dto.code = course.code;
    dto.name = course.name;
    dto.validityDays = course.validityDays;
    dto.graceDays = course.graceDays;
    return dto;
  }
}
