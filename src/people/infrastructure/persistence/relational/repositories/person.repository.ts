import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PersonEntity } from '../entities/person.entity';
import { PersonRepositoryPort } from '../../../../domain/repositories/person.repository.port';
import { Person } from '../../../../domain/entities/person.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { RoleEnum } from '../../../../../roles/roles.enum';
import { EntityNotFoundError } from '../../../../../utils/errors/compliance-errors';

@Injectable()
export class PersonRelationalRepository implements PersonRepositoryPort {
  constructor(
    @InjectRepository(PersonEntity)
    private readonly repository: Repository<PersonEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Person>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByEmployeeNo(employeeNo: string): Promise<NullableType<Person>> {
    const entity = await this.repository.findOne({ where: { employeeNo } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByEmail(email: string): Promise<NullableType<Person>> {
    const entity = await this.repository.findOne({
      where: { email: email.toLowerCase() },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async create(data: Omit<Person, 'id' | 'createdAt'>): Promise<Person> {
    const entity = this.repository.create({
      employeeNo: data.employeeNo,
      name: data.name,
      email: data.email.toLowerCase(),
      role: data.role,
    });
    const saved = await this.repository.save(entity);
    return this.toDomain(saved);
  }

  async updateRole(id: number, role: RoleEnum): Promise<Person> {
    await this.repository.update(id, { role });
    const updated = await this.findById(id);
    if (!updated) {
      throw new EntityNotFoundError('Person', id);
    }
    return updated;
  }

  private toDomain(entity: PersonEntity): Person {
    return {
      id: entity.id,
      employeeNo: entity.employeeNo,
      name: entity.name,
      email: entity.email,
      role: entity.role,
      createdAt: entity.createdAt,
    };
  }
}
