import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class UploadVersionDto {
  @ApiPropertyOptional({
    description: 'Opaque artifact-store key of the new version',
    example: 'sops/bsc-sop-v2.pdf',
  })
  @IsString()
  @MaxLength(512)
  @IsOptional()
  artifactKey?: string;
}
