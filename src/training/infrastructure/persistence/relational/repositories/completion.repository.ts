import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CompletionEntity } from '../entities/completion.entity';
import { CompletionRepositoryPort } from '../../../../domain/repositories/completion.repository.port';
import { Completion } from '../../../../domain/entities/completion.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { CalendarDay } from '../../../../../compliance/domain/utils/calendar-day.util';

@Injectable()
export class CompletionRelationalRepository implements CompletionRepositoryPort {
  constructor(
    @InjectRepository(CompletionEntity)
    private readonly repository: Repository<CompletionEntity>,
  ) {}

  async findOne(
    personId: number,
    courseId: number,
    completedOn: CalendarDay,
  ): Promise<NullableType<Completion>> {
    const entity = await this.repository.findOne({
      where: { personId, courseId, completedOn },
    });
    return entity ? this.toDomain(entity) : null;
  }

  async findByPersonAndCourses(
    personId: number,
    courseIds: number[],
  ): Promise<Completion[]> {
    if (courseIds.length === 0) {
      return [];
    }
    const entities = await this.repository.find({
      where: { personId, courseId: In(courseIds) },
      order: { completedOn: 'ASC', id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findByPerson(personId: number): Promise<Completion[]> {
    const entities = await this.repository.find({
      where: { personId },
      order: { completedOn: 'DESC', id: 'DESC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findAll(): Promise<Completion[]> {
    const entities = await this.repository.find({
      order: { completedOn: 'ASC', id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: Omit<Completion, 'id' | 'recordedAt'>): Promise<Completion> {
    const saved = await this.repository.save(
      this.repository.create({
        personId: data.personId,
        courseId: data.courseId,
        completedOn: data.completedOn,
        certificateKey: data.certificateKey,
      }),
    );
    return this.toDomain(saved);
  }

  private toDomain(entity: CompletionEntity): Completion {
    return {
      id: entity.id,
      personId: entity.personId,
      courseId: entity.courseId,
      completedOn: entity.completedOn,
      certificateKey: entity.certificateKey,
      recordedAt: entity.recordedAt,
    };
  }
}
