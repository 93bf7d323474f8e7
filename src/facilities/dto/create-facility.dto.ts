import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateFacilityDto {
  @ApiProperty({ example: 'BSL2-A' })
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]+$/)
  @MaxLength(64)
  code!: string;

  @ApiProperty({ example: 'Building 4, Suite A' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;
}
