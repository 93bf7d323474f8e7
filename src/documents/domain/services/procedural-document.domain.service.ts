import { Injectable, Logger } from '@nestjs/common';
import { ProceduralDocumentRepositoryPort } from '../repositories/procedural-document.repository.port';
import { DocumentVersionRepositoryPort } from '../repositories/document-version.repository.port';
import { AcknowledgmentRepositoryPort } from '../repositories/acknowledgment.repository.port';
import { FacilityRepositoryPort } from '../../../facilities/domain/repositories/facility.repository.port';
import { PersonRepositoryPort } from '../../../people/domain/repositories/person.repository.port';
import { ProceduralDocument } from '../entities/procedural-document.entity';
import { DocumentVersion } from '../entities/document-version.entity';
import { Acknowledgment } from '../entities/acknowledgment.entity';
import { Actor, actorPersonId } from '../../../auth/domain/actor';
import { Clock } from '../../../clock/clock';
import {
  AuditAction,
  AuditEntityType,
  AuditService,
} from '../../../audit/audit.service';
import {
  DuplicateRequestError,
  EntityNotFoundError,
} from '../../../utils/errors/compliance-errors';
import { isUniqueViolation } from '../../../utils/errors/database-errors';
import { KeyedMutex } from '../../../utils/keyed-mutex';

export interface CreateDocumentInput {
  title: string;
  mandatory?: boolean;
  artifactKey?: string | null;
}

export interface AcknowledgeResult {
  acknowledgment: Acknowledgment;
  created: boolean;
}

/**
 * Procedural Document Domain Service
 *
 * Versions are appended, never overwritten; uploading one bumps
 * currentVersion and thereby invalidates every earlier acknowledgment.
 * Acknowledgments are idempotent per (person, document, version).
 */
@Injectable()
export class ProceduralDocumentDomainService {
  private readonly logger = new Logger(ProceduralDocumentDomainService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly documentRepository: ProceduralDocumentRepositoryPort,
    private readonly versionRepository: DocumentVersionRepositoryPort,
    private readonly acknowledgmentRepository: AcknowledgmentRepositoryPort,
    private readonly facilityRepository: FacilityRepositoryPort,
    private readonly personRepository: PersonRepositoryPort,
    private readonly auditService: AuditService,
    private readonly clock: Clock,
  ) {}

  async createDocument(
    facilityId: number,
    input: CreateDocumentInput,
    actor: Actor,
  ): Promise<ProceduralDocument> {
    const facility = await this.facilityRepository.findById(facilityId);
    if (!facility) {
      throw new EntityNotFoundError('Facility', facilityId);
    }

    const document = await this.documentRepository.create({
      facilityId,
      title: input.title,
      mandatory: input.mandatory ?? true,
      currentVersion: 1,
    });
    await this.versionRepository.create({
      documentId: document.id,
      version: 1,
      artifactKey: input.artifactKey ?? null,
      uploadedAt: this.clock.now(),
      uploadedById: actorPersonId(actor),
    });

    await this.auditService.record({
      actor,
      entityType: AuditEntityType.DOCUMENT,
      entityId: document.id,
      action: AuditAction.DOCUMENT_CREATED,
      metadata: {
        facilityId,
        title: document.title,
        mandatory: document.mandatory,
        version: 1,
      },
    });

    return document;
  }

  async getDocument(id: number): Promise<ProceduralDocument> {
    const document = await this.documentRepository.findById(id);
    if (!document) {
      throw new EntityNotFoundError('Document', id);
    }
    return document;
  }

  async listDocuments(facilityId: number): Promise<ProceduralDocument[]> {
    const facility = await this.facilityRepository.findById(facilityId);
    if (!facility) {
      throw new EntityNotFoundError('Facility', facilityId);
    }
    return this.documentRepository.findByFacility(facilityId);
  }

  async listVersions(documentId: number): Promise<DocumentVersion[]> {
    await this.getDocument(documentId);
    return this.versionRepository.findByDocument(documentId);
  }

  async uploadVersion(
    documentId: number,
    artifactKey: string | null,
    actor: Actor,
  ): Promise<{ document: ProceduralDocument; version: DocumentVersion }> {
    return this.locks.runExclusive(`document:${documentId}`, async () => {
      const current = await this.getDocument(documentId);
      const bumped = await this.documentRepository.bumpVersion(
        documentId,
        current.currentVersion,
      );
      if (!bumped) {
        throw new DuplicateRequestError(
          `Document ${documentId} was updated concurrently; retry the upload`,
          { documentId, expectedVersion: current.currentVersion },
        );
      }

      const version = await this.versionRepository.create({
        documentId,
        version: bumped.currentVersion,
        artifactKey,
        uploadedAt: this.clock.now(),
        uploadedById: actorPersonId(actor),
      });

      await this.auditService.record({
        actor,
        entityType: AuditEntityType.DOCUMENT,
        entityId: documentId,
        action: AuditAction.DOCUMENT_VERSION_UPLOADED,
        metadata: {
          fromVersion: current.currentVersion,
          toVersion: bumped.currentVersion,
        },
      });
      this.logger.log(
        `Document ${documentId} now at v${bumped.currentVersion}; earlier acknowledgments no longer current`,
      );

      return { document: bumped, version };
    });
  }

  /**
   * Acknowledge the document's current version on behalf of `personId`.
   */
  async acknowledge(
    personId: number,
    documentId: number,
    actor: Actor,
  ): Promise<AcknowledgeResult> {
    const person = await this.personRepository.findById(personId);
    if (!person) {
      throw new EntityNotFoundError('Person', personId);
    }
    const document = await this.getDocument(documentId);
    const version = document.currentVersion;

    const existing = await this.acknowledgmentRepository.findOne(
      personId,
      documentId,
      version,
    );
    if (existing) {
      return { acknowledgment: existing, created: false };
    }

    let acknowledgment: Acknowledgment;
    try {
      acknowledgment = await this.acknowledgmentRepository.create({
        personId,
        documentId,
        version,
        acknowledgedAt: this.clock.now(),
      });
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
      // A concurrent acknowledgment of the same version landed first
      const winner = await this.acknowledgmentRepository.findOne(
        personId,
        documentId,
        version,
      );
      if (!winner) {
        throw error;
      }
      return { acknowledgment: winner, created: false };
    }

    await this.auditService.record({
      actor,
      entityType: AuditEntityType.ACKNOWLEDGMENT,
      entityId: acknowledgment.id,
      action: AuditAction.DOCUMENT_ACKNOWLEDGED,
      metadata: { personId, documentId, version },
    });

    return { acknowledgment, created: true };
  }
}
