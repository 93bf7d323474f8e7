import { NullableType } from '../../../utils/types/nullable.type';
import { Course } from '../entities/course.entity';

export abstract class CourseRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Course>>;

  abstract findByIds(ids: number[]): Promise<Course[]>;

  abstract findByCode(code: string): Promise<NullableType<Course>>;

  /**
   * Ordered by code
   */
  abstract findAll(): Promise<Course[]>;

  abstract create(data: Omit<Course, 'id' | 'createdAt'>): Promise<Course>;
}
