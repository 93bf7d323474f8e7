import {
  IsEmail,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { RoleEnum } from '../../roles/roles.enum';

export class CreatePersonDto {
  @ApiProperty({ example: 'E-1042' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  employeeNo!: string;

  @ApiProperty({ example: 'Dana Okafor' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @ApiProperty({ example: 'dana.okafor@example.org' })
  @IsEmail()
  email!: string;

  @ApiPropertyOptional({ enum: RoleEnum, default: RoleEnum.member })
  @IsEnum(RoleEnum)
  @IsOptional()
  role?: RoleEnum;
}
