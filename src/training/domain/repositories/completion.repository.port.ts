import { NullableType } from '../../../utils/types/nullable.type';
import { Completion } from '../entities/completion.entity';
import { CalendarDay } from '../../../compliance/domain/utils/calendar-day.util';

export abstract class CompletionRepositoryPort {
  abstract findOne(
    personId: number,
    courseId: number,
    completedOn: CalendarDay,
  ): Promise<NullableType<Completion>>;

  /**
   * Every completion of the person for any of the given courses, in
   * ascending (completedOn, id) order.
   */
  abstract findByPersonAndCourses(
    personId: number,
    courseIds: number[],
  ): Promise<Completion[]>;

  abstract findByPerson(personId: number): Promise<Completion[]>;

  abstract findAll(): Promise<Completion[]>;

  abstract create(data: Omit<Completion, 'id' | 'recordedAt'>): Promise<Completion>;
}
