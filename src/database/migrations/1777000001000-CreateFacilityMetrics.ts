import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateFacilityMetrics1777000001000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE facility_metrics (
        id SERIAL PRIMARY KEY,
        facility_id INTEGER NOT NULL REFERENCES facilities (id) ON DELETE CASCADE,
        as_of DATE NOT NULL,
        utilization INTEGER NOT NULL,
        condition INTEGER NOT NULL,
        activity INTEGER NOT NULL,
        recorded_at TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT chk_facility_metrics_utilization CHECK (utilization BETWEEN 0 AND 100),
        CONSTRAINT chk_facility_metrics_condition CHECK (condition BETWEEN 0 AND 100),
        CONSTRAINT chk_facility_metrics_activity CHECK (activity BETWEEN 0 AND 100)
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_facility_metrics_facility_day" ON facility_metrics (facility_id, as_of)`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS facility_metrics`);
  }
}
