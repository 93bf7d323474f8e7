import { RoleEnum } from '../../../roles/roles.enum';

/**
 * Domain entity for Person
 *
 * Identity (id, employeeNo) is fixed at provisioning; role may change.
 */
export interface Person {
  id: number;
  employeeNo: string;
  name: string;
  email: string;
  role: RoleEnum;
  createdAt: Date;
}
