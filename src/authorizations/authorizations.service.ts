import { Injectable } from '@nestjs/common';
import { AuthorizationDomainService } from './domain/services/authorization.domain.service';
import { AuthorizationRepositoryPort } from './domain/repositories/authorization.repository.port';
import { Authorization } from './domain/entities/authorization.entity';
import { RequestAccessDto } from './dto/request-access.dto';
import { ManualDecisionDto } from './dto/manual-decision.dto';
import { ListAuthorizationsDto } from './dto/list-authorizations.dto';
import { AuthorizationResponseDto } from './dto/authorization-response.dto';
import { ManualDecisionResponseDto } from './dto/manual-decision-response.dto';
import { AuditEventResponseDto } from '../audit/dto/audit-event-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { PersonActor } from '../auth/domain/actor';
import { RoleEnum } from '../roles/roles.enum';
import { UnauthorizedActionError } from '../utils/errors/compliance-errors';

const DECIDING_ROLES: ReadonlySet<RoleEnum> = new Set([
  RoleEnum.approver,
  RoleEnum.administrator,
]);

/**
 * Authorizations Application Service
 *
 * Applies role rules, then delegates to the state machine.
 *
 * Authorization Rules:
 * - Request: members for themselves; approvers and administrators for anyone
 * - Cancel: the requester, the subject, or an approver/administrator
 * - Decide / revoke: approvers and administrators only
 * - Read: approvers and administrators see all; members see their own
 */
@Injectable()
export class AuthorizationsService {
  constructor(
    private readonly authorizationService: AuthorizationDomainService,
    private readonly authorizationRepository: AuthorizationRepositoryPort,
  ) {}

  async requestAccess(
    dto: RequestAccessDto,
    actor: PersonActor,
  ): Promise<AuthorizationResponseDto> {
    const personId = dto.personId ?? actor.id;
    if (personId !== actor.id && !this.canDecide(actor)) {
      throw new UnauthorizedActionError(
        'Members may only request access for themselves',
      );
    }
    const authorization = await this.authorizationService.requestAccess(
      personId,
      dto.facilityId,
      actor,
    );
    return AuthorizationResponseDto.fromDomain(authorization);
  }

  async cancelRequest(
    authorizationId: number,
    actor: PersonActor,
  ): Promise<AuthorizationResponseDto> {
    const authorization =
      await this.authorizationService.getAuthorization(authorizationId);
    const ownRequest =
      authorization.requestedById === actor.id ||
      authorization.personId === actor.id;
    if (!ownRequest && !this.canDecide(actor)) {
      throw new UnauthorizedActionError(
        'Only the requester or an approver may cancel this request',
      );
    }
    const outcome = await this.authorizationService.cancelRequest(
      authorizationId,
      actor,
    );
    return AuthorizationResponseDto.fromDomain(outcome.authorization);
  }

  async decide(
    authorizationId: number,
    dto: ManualDecisionDto,
    actor: PersonActor,
  ): Promise<ManualDecisionResponseDto> {
    this.assertCanDecide(actor, 'make manual decisions');
    const outcome = await this.authorizationService.manualDecision(
      authorizationId,
      dto.approve,
      actor,
      undefined,
      dto.notes,
    );
    return ManualDecisionResponseDto.fromOutcome(outcome);
  }

  async revoke(
    authorizationId: number,
    actor: PersonActor,
    notes?: string,
  ): Promise<AuthorizationResponseDto> {
    this.assertCanDecide(actor, 'revoke access');
    const outcome = await this.authorizationService.revokeAccess(
      authorizationId,
      actor,
      undefined,
      notes,
    );
    return AuthorizationResponseDto.fromDomain(outcome.authorization);
  }

  async get(
    authorizationId: number,
    actor: PersonActor,
  ): Promise<AuthorizationResponseDto> {
    const authorization =
      await this.authorizationService.getAuthorization(authorizationId);
    this.assertCanRead(authorization, actor);
    return AuthorizationResponseDto.fromDomain(authorization);
  }

  async history(
    authorizationId: number,
    actor: PersonActor,
  ): Promise<AuditEventResponseDto[]> {
    const authorization =
      await this.authorizationService.getAuthorization(authorizationId);
    this.assertCanRead(authorization, actor);
    const entries = await this.authorizationService.getHistory(authorizationId);
    return entries.map(AuditEventResponseDto.fromDomain);
  }

  async list(
    query: ListAuthorizationsDto,
    actor: PersonActor,
  ): Promise<InfinityPaginationResponseDto<AuthorizationResponseDto>> {
    // Members only ever see their own records
    const personId = this.canDecide(actor) ? query.personId : actor.id;
    const authorizations = await this.authorizationRepository.list({
      personId,
      facilityId: query.facilityId,
      state: query.state,
    });
    return infinityPagination(
      authorizations.map(AuthorizationResponseDto.fromDomain),
      { page: query.page ?? 1, limit: query.limit ?? 20 },
    );
  }

  private canDecide(actor: PersonActor): boolean {
    return DECIDING_ROLES.has(actor.role);
  }

  private assertCanDecide(actor: PersonActor, what: string): void {
    if (!this.canDecide(actor)) {
      throw new UnauthorizedActionError(
        `Role ${actor.role} may not ${what}`,
      );
    }
  }

  private assertCanRead(authorization: Authorization, actor: PersonActor): void {
    if (!this.canDecide(actor) && authorization.personId !== actor.id) {
      throw new UnauthorizedActionError(
        'Members may only view their own authorizations',
      );
    }
  }
}
