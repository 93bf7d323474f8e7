import { ApiProperty } from '@nestjs/swagger';
import { RoleEnum } from '../../roles/roles.enum';
import { Person } from '../domain/entities/person.entity';

export class PersonResponseDto {
  @ApiProperty({ example: 7 })
  id!: number;

  @ApiProperty({ example: 'E-1042' })
  employeeNo!: string;

  @ApiProperty({ example: 'Dana Okafor' })
  name!: string;

  @ApiProperty({ example: 'dana.okafor@example.org' })
  email!: string;

  @ApiProperty({ enum: RoleEnum })
  role!: RoleEnum;

  @ApiProperty()
  createdAt!: Date;

  static fromDomain(person: Person): PersonResponseDto {
    const dto = new PersonResponseDto();
    dto.id = person.id;
    dto.employeeNo = person.employeeNo;
    dto.name = person.name;
    dto.email = person.email;
    dto.role = person.role;
    dto.createdAt = person.createdAt;
    return dto;
  }
}
