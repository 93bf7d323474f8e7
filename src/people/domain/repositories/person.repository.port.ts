import { NullableType } from '../../../utils/types/nullable.type';
import { Person } from '../entities/person.entity';
import { RoleEnum } from '../../../roles/roles.enum';

export abstract class PersonRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Person>>;

  abstract findByEmployeeNo(employeeNo: string): Promise<NullableType<Person>>;

  abstract findByEmail(email: string): Promise<NullableType<Person>>;

  abstract create(data: Omit<Person, 'id' | 'createdAt'>): Promise<Person>;

  abstract updateRole(id: number, role: RoleEnum): Promise<Person>;
}
