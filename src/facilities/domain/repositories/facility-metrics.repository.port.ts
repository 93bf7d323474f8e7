import { NullableType } from '../../../utils/types/nullable.type';
import { FacilityMetrics, FacilityMetricsInput } from '../entities/facility-metrics.entity';

export abstract class FacilityMetricsRepositoryPort {
  /**
   * Insert the day's snapshot, or overwrite the scores of an existing one
   */
  abstract upsert(data: FacilityMetricsInput): Promise<FacilityMetrics>;

  abstract findLatest(facilityId: number): Promise<NullableType<FacilityMetrics>>;

  /**
   * Snapshots of a facility, newest day first
   */
  abstract findByFacility(
    facilityId: number,
    limit: number,
  ): Promise<FacilityMetrics[]>;
}
