import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { DocumentCurrency } from '../domain/utils/document-currency.util';

export class DocumentCurrencyResponseDto {
  @ApiProperty({ example: 7 })
  personId!: number;

  @ApiProperty({ example: 4 })
  documentId!: number;

  @ApiProperty({ example: 2 })
  requiredVersion!: number;

  @ApiPropertyOptional({ nullable: true, example: 1 })
  acknowledgedVersion!: number | null;

  @ApiProperty({ example: false })
  current!: boolean;

  static fromDomain(
    personId: number,
    currency: DocumentCurrency,
  ): DocumentCurrencyResponseDto {
    const dto = new DocumentCurrencyResponseDto();
    dto.personId = personId;
    dto.documentId = currency.documentId;
    dto.requiredVersion = currency.requiredVersion;
    dto.acknowledgedVersion = currency.acknowledgedVersion;
    dto.current = currency.current;
    return dto;
  }
}
