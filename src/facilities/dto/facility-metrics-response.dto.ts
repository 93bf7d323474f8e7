import { ApiProperty } from '@nestjs/swagger';
import { FacilityMetrics } from '../domain/entities/facility-metrics.entity';

export class FacilityMetricsResponseDto {
  @ApiProperty({ example: 2 })
  facilityId!: number;

  @ApiProperty({ example: '2024-07-05' })
  asOf!: string;

  @ApiProperty({ example: 62 })
  utilization!: number;

  @ApiProperty({ example: 91 })
  condition!: number;

  @ApiProperty({ example: 74 })
  activity!: number;

  @ApiProperty({ type: Date })
  recordedAt!: Date;

  static fromDomain(metrics: FacilityMetrics): FacilityMetricsResponseDto {
    const dto = new FacilityMetricsResponseDto();
    dto.facilityId = metrics.facilityId;
    dto.asOf = metrics.asOf;
    dto.utilization = metrics.utilization;
    dto.condition = metrics.condition;
    dto.activity = metrics.activity;
    dto.recordedAt = metrics.recordedAt;
    return dto;
  }
}
