import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RevokeAuthorizationDto {
  @ApiPropertyOptional({ example: 'Left the project' })
  @IsString()
  @MaxLength(1000)
  @IsOptional()
  notes?: string;
}
