import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ProceduralDocument } from '../domain/entities/procedural-document.entity';
import { DocumentVersion } from '../domain/entities/document-version.entity';

export class DocumentVersionResponseDto {
  @ApiProperty({ example: 2 })
  version!: number;

  @ApiPropertyOptional({ nullable: true })
  artifactKey!: string | null;

  @ApiProperty()
  uploadedAt!: Date;

  static fromDomain(version: DocumentVersion): DocumentVersionResponseDto {
    const dto = new DocumentVersionResponseDto();
    dto.version = version.version;
    dto.artifactKey = version.artifactKey;
    dto.uploadedAt = version.uploadedAt;
    return dto;
  }
}

export class DocumentResponseDto {
  @ApiProperty({ example: 4 })
  id!: number;

  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ example: 'Biosafety Cabinet SOP' })
  title!: string;

  @ApiProperty()
  mandatory!: boolean;

  @ApiProperty({ example: 2 })
  currentVersion!: number;

  @ApiPropertyOptional({ type: [DocumentVersionResponseDto] })
  versions?: DocumentVersionResponseDto[];

  static fromDomain(
    document: ProceduralDocument,
    versions?: DocumentVersion[],
  ): DocumentResponseDto {
    const dto = new DocumentResponseDto();
    dto.id = document.id;
    dto.facilityId = document.facilityId;
    dto.title = document.title;
    dto.mandatory = document.mandatory;
    dto.currentVersion = document.currentVersion;
    if (versions) {
      dto.versions = versions.map(DocumentVersionResponseDto.fromDomain);
    }
    return dto;
  }
}
