import { NullableType } from '../../../utils/types/nullable.type';
import { Facility } from '../entities/facility.entity';

export abstract class FacilityRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Facility>>;

  abstract findByCode(code: string): Promise<NullableType<Facility>>;

  abstract findAll(): Promise<Facility[]>;

  abstract create(data: Omit<Facility, 'id' | 'createdAt'>): Promise<Facility>;
}
