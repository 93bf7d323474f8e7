import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CourseEntity } from '../entities/course.entity';
import { CourseRepositoryPort } from '../../../../domain/repositories/course.repository.port';
import { Course } from '../../../../domain/entities/course.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class CourseRelationalRepository implements CourseRepositoryPort {
  constructor(
    @InjectRepository(CourseEntity)
    private readonly repository: Repository<CourseEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Course>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByIds(ids: number[]): Promise<Course[]> {
    if (ids.length === 0) {
      return [];
    }
    const entities = await this.repository.find({ where: { id: In(ids) } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async findByCode(code: string): Promise<NullableType<Course>> {
    const entity = await this.repository.findOne({ where: { code } });
    return entity ? this.toDomain(entity) : null;
  }

  async findAll(): Promise<Course[]> {
    const entities = await this.repository.find({ order: { code: 'ASC' } });
    return entities.map((entity) => this.toDomain(entity));
  }

  async create(data: Omit<Course, 'id' | 'createdAt'>): Promise<Course> {
    const saved = await this.repository.save(this.repository.create(data));
    return this.toDomain(saved);
  }

  private toDomain(entity: CourseEntity): Course {
    return {
      id: entity.id,
      code: entity.code,
      name: entity.name,
      validityDays: entity.validityDays,
      graceDays: entity.graceDays,
      createdAt: entity.createdAt,
    };
  }
}
