import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Completion } from '../domain/entities/completion.entity';

export class CompletionResponseDto {
  @ApiProperty({ example: 11 })
  id!: number;

  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 3 })
  courseId!: number;

  @ApiProperty({ example: '2024-01-01' })
  completedOn!: string;

  @ApiPropertyOptional({ nullable: true })
  certificateKey!: string | null;

  @ApiProperty()
  recordedAt!: Date;

  static fromDomain(completion: Completion): CompletionResponseDto {
    const dto = new CompletionResponseDto();
    dto.id = completion.id;
    dto.personId = completion.personId;
    dto.courseId = completion.courseId;
    dto.completedOn = completion.completedOn;
    dto.certificateKey = completion.certificateKey;
    dto.recordedAt = completion.recordedAt;
    return dto;
  }
}
