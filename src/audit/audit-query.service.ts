import { Injectable } from '@nestjs/common';
import { AuditEntryRepositoryPort } from './domain/repositories/audit-entry.repository.port';
import { ListAuditEventsDto } from './dto/list-audit-events.dto';
import { AuditEventResponseDto } from './dto/audit-event-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';

/**
 * Read side of the audit trail.
 */
@Injectable()
export class AuditQueryService {
  constructor(private readonly auditRepository: AuditEntryRepositoryPort) {}

  async list(
    query: ListAuditEventsDto,
  ): Promise<InfinityPaginationResponseDto<AuditEventResponseDto>> {
    const entries = await this.auditRepository.find({
      entityType: query.entityType,
      entityId: query.entityId,
      action: query.action,
      actorType: query.actorType,
      actorId: query.actorId,
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
    });

    return infinityPagination(entries.map(AuditEventResponseDto.fromDomain), {
      page: query.page ?? 1,
      limit: query.limit ?? 50,
    });
  }
}
