import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { RoleEnum } from '../../../../../roles/roles.enum';

@Entity({ name: 'people' })
@Check(`"role" IN ('member', 'approver', 'administrator')`)
export class PersonEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'employee_no', type: 'varchar', length: 64 })
  @Index({ unique: true })
  employeeNo!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index({ unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 20, default: RoleEnum.member })
  role!: RoleEnum;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
