import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreateDocumentDto {
  @ApiProperty({ example: 'Biosafety Cabinet SOP' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title!: string;

  @ApiPropertyOptional({ default: true })
  @IsBoolean()
  @IsOptional()
  mandatory?: boolean;

  @ApiPropertyOptional({
    description: 'Opaque artifact-store key of version 1',
    example: 'sops/bsc-sop-v1.pdf',
  })
  @IsString()
  @MaxLength(512)
  @IsOptional()
  artifactKey?: string;
}
