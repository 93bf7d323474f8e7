import { IsInt, IsOptional } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class RequestAccessDto {
  @ApiProperty({ example: 2 })
  @IsInt()
  facilityId!: number;

  @ApiPropertyOptional({
    description: 'Person the request is for. Defaults to the caller; members may only request for themselves.',
    example: 7,
  })
  @IsInt()
  @IsOptional()
  personId?: number;
}
