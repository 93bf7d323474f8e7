import { Injectable, Logger } from '@nestjs/common';
import { PersonRepositoryPort } from './domain/repositories/person.repository.port';
import { Person } from './domain/entities/person.entity';
import { CreatePersonDto } from './dto/create-person.dto';
import { RoleEnum } from '../roles/roles.enum';
import { Actor } from '../auth/domain/actor';
import {
  AuditAction,
  AuditEntityType,
  AuditService,
} from '../audit/audit.service';
import {
  DuplicateRequestError,
  EntityNotFoundError,
} from '../utils/errors/compliance-errors';

@Injectable()
export class PeopleService {
  private readonly logger = new Logger(PeopleService.name);

  constructor(
    private readonly personRepository: PersonRepositoryPort,
    private readonly auditService: AuditService,
  ) {}

  async create(dto: CreatePersonDto, actor: Actor): Promise<Person> {
    if (await this.personRepository.findByEmployeeNo(dto.employeeNo)) {
      throw new DuplicateRequestError(
        `Employee number ${dto.employeeNo} is already registered`,
        { employeeNo: dto.employeeNo },
      );
    }
    if (await this.personRepository.findByEmail(dto.email)) {
      throw new DuplicateRequestError('Email is already registered');
    }

    const person = await this.personRepository.create({
      employeeNo: dto.employeeNo,
      name: dto.name,
      email: dto.email,
      role: dto.role ?? RoleEnum.member,
    });

    await this.auditService.record({
      actor,
      entityType: AuditEntityType.PERSON,
      entityId: person.id,
      action: AuditAction.PERSON_CREATED,
      metadata: { employeeNo: person.employeeNo, role: person.role },
    });
    this.logger.log(`Person ${person.id} provisioned`);

    return person;
  }

  async getById(id: number): Promise<Person> {
    const person = await this.personRepository.findById(id);
    if (!person) {
      throw new EntityNotFoundError('Person', id);
    }
    return person;
  }

  async changeRole(id: number, role: RoleEnum, actor: Actor): Promise<Person> {
    const existing = await this.getById(id);
    if (existing.role === role) {
      return existing;
    }

    const updated = await this.personRepository.updateRole(id, role);
    await this.auditService.record({
      actor,
      entityType: AuditEntityType.PERSON,
      entityId: id,
      action: AuditAction.PERSON_ROLE_CHANGED,
      metadata: { from: existing.role, to: role },
    });
    return updated;
  }
}
