import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { AuditEntryEntity } from '../entities/audit-entry.entity';
import {
  AuditEntryFilter,
  AuditEntryRepositoryPort,
} from '../../../../domain/repositories/audit-entry.repository.port';
import {
  AuditEntry,
  NewAuditEntry,
} from '../../../../domain/entities/audit-entry.entity';

@Injectable()
export class AuditEntryRelationalRepository implements AuditEntryRepositoryPort {
  constructor(
    @InjectRepository(AuditEntryEntity)
    private readonly repository: Repository<AuditEntryEntity>,
  ) {}

  async append(entry: NewAuditEntry): Promise<AuditEntry> {
    const entity = this.repository.create({
      occurredAt: entry.occurredAt,
      actorType: entry.actorType,
      actorId: entry.actorId,
      entityType: entry.entityType,
      entityId: entry.entityId,
      action: entry.action,
      priorState: entry.priorState,
      newState: entry.newState,
      detail: entry.detail,
      metadata: entry.metadata ? { ...entry.metadata } : null,
    });

    // insert (not save) so an existing row can never be overwritten
    const result = await this.repository.insert(entity);
    const id = Number(result.identifiers[0]?.id);
    return this.toDomain({ ...entity, id });
  }

  async findByEntity(entityType: string, entityId: string): Promise<AuditEntry[]> {
    const entities = await this.repository.find({
      where: { entityType, entityId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async find(filter: AuditEntryFilter): Promise<AuditEntry[]> {
    const where: FindOptionsWhere<AuditEntryEntity> = {};
    if (filter.entityType) where.entityType = filter.entityType;
    if (filter.entityId) where.entityId = filter.entityId;
    if (filter.action) where.action = filter.action;
    if (filter.actorType) where.actorType = filter.actorType;
    if (filter.actorId !== undefined) where.actorId = filter.actorId;
    if (filter.from && filter.to) {
      where.occurredAt = Between(filter.from, filter.to);
    } else if (filter.from) {
      where.occurredAt = MoreThanOrEqual(filter.from);
    } else if (filter.to) {
      where.occurredAt = LessThanOrEqual(filter.to);
    }

    const entities = await this.repository.find({
      where,
      order: { id: 'DESC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: AuditEntryEntity): AuditEntry {
    return {
      id: entity.id,
      occurredAt: entity.occurredAt,
      actorType: entity.actorType,
      actorId: entity.actorId,
      entityType: entity.entityType,
      entityId: entity.entityId,
      action: entity.action,
      priorState: entity.priorState,
      newState: entity.newState,
      detail: entity.detail,
      metadata: entity.metadata,
    };
  }
}
