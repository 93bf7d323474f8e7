import { IsEnum } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { RoleEnum } from '../../roles/roles.enum';

export class UpdatePersonRoleDto {
  @ApiProperty({ enum: RoleEnum, example: RoleEnum.approver })
  @IsEnum(RoleEnum)
  role!: RoleEnum;
}
