import { ApiProperty } from '@nestjs/swagger';
import { Acknowledgment } from '../domain/entities/acknowledgment.entity';

export class AcknowledgmentResponseDto {
  @ApiProperty({ example: 19 })
  id!: number;

  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 4 })
  documentId!: number;

  @ApiProperty({ example: 2 })
  version!: number;

  @ApiProperty()
  acknowledgedAt!: Date;

  @ApiProperty({ description: 'False when this version was already acknowledged' })
  created!: boolean;

  static fromDomain(
    acknowledgment: Acknowledgment,
    created: boolean,
  ): AcknowledgmentResponseDto {
    const dto = new AcknowledgmentResponseDto();
    dto.id = acknowledgment.id;
    dto.personId = acknowledgment.personId;
    dto.documentId = acknowledgment.documentId;
    dto.version = acknowledgment.version;
    dto.acknowledgedAt = acknowledgment.acknowledgedAt;
    dto.created = created;
    return dto;
  }
}
