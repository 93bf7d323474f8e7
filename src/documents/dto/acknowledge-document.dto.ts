import { IsInt, IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class AcknowledgeDocumentDto {
  @ApiPropertyOptional({
    description:
      'Person acknowledging. Defaults to the caller; only administrators may acknowledge for someone else.',
    example: 7,
  })
  @IsInt()
  @IsOptional()
  personId?: number;
}
