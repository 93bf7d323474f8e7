import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Not, Repository } from 'typeorm';
import { AuthorizationEntity } from '../entities/authorization.entity';
import {
  AuthorizationFilter,
  AuthorizationRepositoryPort,
} from '../../../../domain/repositories/authorization.repository.port';
import {
  Authorization,
  AuthorizationTransitionPatch,
  NewAuthorization,
} from '../../../../domain/entities/authorization.entity';
import { AuthorizationState } from '../../../../domain/enums/authorization-state.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { DuplicateRequestError } from '../../../../../utils/errors/compliance-errors';
import { isUniqueViolation } from '../../../../../utils/errors/database-errors';

@Injectable()
export class AuthorizationRelationalRepository
  implements AuthorizationRepositoryPort
{
  constructor(
    @InjectRepository(AuthorizationEntity)
    private readonly repository: Repository<AuthorizationEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Authorization>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findOpenForPair(
    personId: number,
    facilityId: number,
  ): Promise<NullableType<Authorization>> {
    const entity = await this.repository.findOne({
      where: {
        personId,
        facilityId,
        state: Not(AuthorizationState.REVOKED),
      },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async findLatestForPair(
    personId: number,
    facilityId: number,
  ): Promise<NullableType<Authorization>> {
    const entity = await this.repository.findOne({
      where: { personId, facilityId },
      order: { id: 'DESC' },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async findByStates(states: AuthorizationState[]): Promise<Authorization[]> {
    if (states.length === 0) {
      return [];
    }
    const entities = await this.repository.find({
      where: { state: In(states) },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async list(filter: AuthorizationFilter): Promise<Authorization[]> {
    const where: FindOptionsWhere<AuthorizationEntity> = {};
    if (filter.personId !== undefined) where.personId = filter.personId;
    if (filter.facilityId !== undefined) where.facilityId = filter.facilityId;
    if (filter.state) where.state = filter.state;

    const entities = await this.repository.find({
      where,
      order: { id: 'DESC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: NewAuthorization): Promise<Authorization> {
    try {
      const saved = await this.repository.save(
        this.repository.create({
          ...data,
          state: AuthorizationState.PENDING,
          version: 1,
          manualOverride: false,
        }),
      );
      return this.toDomain(saved);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateRequestError(
          `Person ${data.personId} already has an open authorization for facility ${data.facilityId}`,
          { personId: data.personId, facilityId: data.facilityId },
        );
      }
      throw error;
    }
  }

  async transition(
    id: number,
    expectedVersion: number,
    patch: AuthorizationTransitionPatch,
  ): Promise<NullableType<Authorization>> {
    try {
      const result = await this.repository.update(
        { id, version: expectedVersion },
        { ...patch, version: expectedVersion + 1 },
      );
      if (!result.affected) {
        return null;
      }
    } catch (error) {
      // Reopening would collide with another open record of the pair
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    }
    return this.findById(id);
  }

  private toDomain(entity: AuthorizationEntity): Authorization {
    return {
      id: entity.id,
      personId: entity.personId,
      facilityId: entity.facilityId,
      state: entity.state,
      version: entity.version,
      requestedAt: entity.requestedAt,
      requestedById: entity.requestedById,
      activatedAt: entity.activatedAt,
      activatedByType: entity.activatedByType,
      activatedById: entity.activatedById,
      revokedAt: entity.revokedAt,
      revokedByType: entity.revokedByType,
      revokedById: entity.revokedById,
      revocationReason: entity.revocationReason,
      manualOverride: entity.manualOverride,
      decisionNotes: entity.decisionNotes,
      previousAuthorizationId: entity.previousAuthorizationId,
    };
  }
}
