import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { AuthorizationState } from '../domain/enums/authorization-state.enum';

export class ListAuthorizationsDto {
  @ApiPropertyOptional({ example: 7 })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  personId?: number;

  @ApiPropertyOptional({ example: 2 })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  facilityId?: number;

  @ApiPropertyOptional({ enum: AuthorizationState })
  @IsEnum(AuthorizationState)
  @IsOptional()
  state?: AuthorizationState;

  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @IsOptional()
  page?: number;

  @ApiPropertyOptional({ default: 20, minimum: 1, maximum: 100 })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number;
}
