import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateComplianceTables1777000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE people (
        id SERIAL PRIMARY KEY,
        employee_no VARCHAR(64) NOT NULL,
        name VARCHAR(255) NOT NULL,
        email VARCHAR(255) NOT NULL,
        role VARCHAR(20) NOT NULL DEFAULT 'member',
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT chk_people_role CHECK (role IN ('member', 'approver', 'administrator'))
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_people_employee_no" ON people (employee_no)`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_people_email" ON people (email)`,
    );

    await queryRunner.query(`
      CREATE TABLE courses (
        id SERIAL PRIMARY KEY,
        code VARCHAR(64) NOT NULL,
        name VARCHAR(255) NOT NULL,
        validity_days INTEGER NOT NULL,
        grace_days INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT chk_courses_validity CHECK (validity_days > 0),
        CONSTRAINT chk_courses_grace CHECK (grace_days >= 0)
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_courses_code" ON courses (code)`,
    );

    await queryRunner.query(`
      CREATE TABLE completions (
        id SERIAL PRIMARY KEY,
        person_id INTEGER NOT NULL REFERENCES people (id) ON DELETE RESTRICT,
        course_id INTEGER NOT NULL REFERENCES courses (id) ON DELETE RESTRICT,
        completed_on DATE NOT NULL,
        certificate_key VARCHAR(512),
        recorded_at TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_completions_person_course_day" ON completions (person_id, course_id, completed_on)`,
    );

    await queryRunner.query(`
      CREATE TABLE facilities (
        id SERIAL PRIMARY KEY,
        code VARCHAR(64) NOT NULL,
        name VARCHAR(255) NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_facilities_code" ON facilities (code)`,
    );

    await queryRunner.query(`
      CREATE TABLE requirements (
        id SERIAL PRIMARY KEY,
        facility_id INTEGER NOT NULL REFERENCES facilities (id) ON DELETE CASCADE,
        course_id INTEGER NOT NULL REFERENCES courses (id) ON DELETE RESTRICT,
        validity_days INTEGER,
        grace_days INTEGER,
        CONSTRAINT chk_requirements_validity CHECK (validity_days IS NULL OR validity_days > 0),
        CONSTRAINT chk_requirements_grace CHECK (grace_days IS NULL OR grace_days >= 0)
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_requirements_facility_course" ON requirements (facility_id, course_id)`,
    );

    await queryRunner.query(`
      CREATE TABLE procedural_documents (
        id SERIAL PRIMARY KEY,
        facility_id INTEGER NOT NULL REFERENCES facilities (id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        mandatory BOOLEAN NOT NULL DEFAULT true,
        current_version INTEGER NOT NULL DEFAULT 1,
        created_at TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT chk_procedural_documents_version CHECK (current_version >= 1)
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_procedural_documents_facility" ON procedural_documents (facility_id, mandatory)`,
    );

    await queryRunner.query(`
      CREATE TABLE document_versions (
        id SERIAL PRIMARY KEY,
        document_id INTEGER NOT NULL REFERENCES procedural_documents (id) ON DELETE CASCADE,
        version INTEGER NOT NULL,
        artifact_key VARCHAR(512),
        uploaded_at TIMESTAMPTZ NOT NULL,
        uploaded_by_id INTEGER
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_document_versions_document_version" ON document_versions (document_id, version)`,
    );

    await queryRunner.query(`
      CREATE TABLE acknowledgments (
        id SERIAL PRIMARY KEY,
        person_id INTEGER NOT NULL REFERENCES people (id) ON DELETE RESTRICT,
        document_id INTEGER NOT NULL REFERENCES procedural_documents (id) ON DELETE RESTRICT,
        version INTEGER NOT NULL,
        acknowledged_at TIMESTAMPTZ NOT NULL
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_acknowledgments_person_document_version" ON acknowledgments (person_id, document_id, version)`,
    );

    await queryRunner.query(`
      CREATE TABLE authorizations (
        id SERIAL PRIMARY KEY,
        person_id INTEGER NOT NULL REFERENCES people (id) ON DELETE RESTRICT,
        facility_id INTEGER NOT NULL REFERENCES facilities (id) ON DELETE RESTRICT,
        state VARCHAR(20) NOT NULL DEFAULT 'pending',
        version INTEGER NOT NULL DEFAULT 1,
        requested_at TIMESTAMPTZ NOT NULL,
        requested_by_id INTEGER NOT NULL,
        activated_at TIMESTAMPTZ,
        activated_by_type VARCHAR(20),
        activated_by_id INTEGER,
        revoked_at TIMESTAMPTZ,
        revoked_by_type VARCHAR(20),
        revoked_by_id INTEGER,
        revocation_reason TEXT,
        manual_override BOOLEAN NOT NULL DEFAULT false,
        decision_notes TEXT,
        previous_authorization_id INTEGER REFERENCES authorizations (id),
        CONSTRAINT chk_authorizations_state CHECK (state IN ('pending', 'active', 'revoked')),
        CONSTRAINT chk_authorizations_revoked_at CHECK (state <> 'revoked' OR revoked_at IS NOT NULL),
        CONSTRAINT chk_authorizations_activated_at CHECK (state <> 'active' OR activated_at IS NOT NULL)
      )
    `);
    // At most one pending or active authorization per (person, facility)
    await queryRunner.query(`
      CREATE UNIQUE INDEX "IDX_authorizations_open_pair"
        ON authorizations (person_id, facility_id)
        WHERE state <> 'revoked'
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_authorizations_state" ON authorizations (state)`,
    );

    await queryRunner.query(`
      CREATE TABLE audit_entries (
        id SERIAL PRIMARY KEY,
        occurred_at TIMESTAMPTZ NOT NULL,
        actor_type VARCHAR(20) NOT NULL,
        actor_id INTEGER,
        entity_type VARCHAR(64) NOT NULL,
        entity_id VARCHAR(128) NOT NULL,
        action VARCHAR(64) NOT NULL,
        prior_state VARCHAR(20),
        new_state VARCHAR(20),
        detail TEXT,
        metadata JSONB
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_audit_entries_entity" ON audit_entries (entity_type, entity_id)`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_audit_entries_action_time" ON audit_entries (action, occurred_at)`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_audit_entries_occurred_at" ON audit_entries (occurred_at)`,
    );

    // Audit entries are append-only
    await queryRunner.query(`
      CREATE OR REPLACE FUNCTION audit_entries_reject_change() RETURNS trigger AS $$
      BEGIN
        RAISE EXCEPTION 'audit_entries is append-only';
      END;
      $$ LANGUAGE plpgsql
    `);
    await queryRunner.query(`
      CREATE TRIGGER trg_audit_entries_append_only
        BEFORE UPDATE OR DELETE ON audit_entries
        FOR EACH ROW EXECUTE FUNCTION audit_entries_reject_change()
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `DROP TRIGGER IF EXISTS trg_audit_entries_append_only ON audit_entries`,
    );
    await queryRunner.query(
      `DROP FUNCTION IF EXISTS audit_entries_reject_change()`,
    );
    await queryRunner.query(`DROP TABLE IF EXISTS audit_entries`);
    await queryRunner.query(`DROP TABLE IF EXISTS authorizations`);
    await queryRunner.query(`DROP TABLE IF EXISTS acknowledgments`);
    await queryRunner.query(`DROP TABLE IF EXISTS document_versions`);
    await queryRunner.query(`DROP TABLE IF EXISTS procedural_documents`);
    await queryRunner.query(`DROP TABLE IF EXISTS requirements`);
    await queryRunner.query(`DROP TABLE IF EXISTS facilities`);
    await queryRunner.query(`DROP TABLE IF EXISTS completions`);
    await queryRunner.query(`DROP TABLE IF EXISTS courses`);
    await queryRunner.query(`DROP TABLE IF EXISTS people`);
  }
}
