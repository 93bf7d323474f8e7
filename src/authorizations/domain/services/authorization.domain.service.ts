import { Injectable, Logger } from '@nestjs/common';
import { AuthorizationRepositoryPort } from '../repositories/authorization.repository.port';
import { AuthorizationUnitOfWork } from '../repositories/authorization-unit-of-work.port';
import {
  Authorization,
  AuthorizationTransitionPatch,
} from '../entities/authorization.entity';
import { AuthorizationState } from '../enums/authorization-state.enum';
import { AuthorizationStateMachine } from '../utils/authorization-state-machine.util';
import { PersonRepositoryPort } from '../../../people/domain/repositories/person.repository.port';
import { FacilityRepositoryPort } from '../../../facilities/domain/repositories/facility.repository.port';
import { ComplianceEvaluationService } from '../../../compliance/domain/services/compliance-evaluation.domain.service';
import {
  ComplianceSettings,
  ComplianceSettingsService,
} from '../../../compliance/domain/services/compliance-settings.service';
import { Verdict } from '../../../compliance/domain/types/verdict.types';
import { formatDeficiencies } from '../../../compliance/domain/utils/deficiency-formatter.util';
import { toCalendarDay } from '../../../compliance/domain/utils/calendar-day.util';
import {
  Actor,
  actorPersonId,
  describeActor,
  isAutocheckActor,
} from '../../../auth/domain/actor';
import { Clock } from '../../../clock/clock';
import {
  AuditAction,
  AuditEntityType,
  AuditService,
} from '../../../audit/audit.service';
import { AuditEntry } from '../../../audit/domain/entities/audit-entry.entity';
import {
  DuplicateRequestError,
  EntityNotFoundError,
  EvaluationError,
  IllegalTransitionError,
  UnauthorizedActionError,
} from '../../../utils/errors/compliance-errors';
import { KeyedMutex } from '../../../utils/keyed-mutex';

export const CANCELLED_REASON = 'user_cancelled';
export const MANUAL_REVOKE_REASON = 'manual_revoke';
export const MANUAL_DENY_REASON = 'manual_deny';

export interface TransitionOutcome {
  authorization: Authorization;
  changed: boolean;
  action: AuditAction | null;
}

export interface ManualDecisionOutcome extends TransitionOutcome {
  // Null when the catalogue could not be evaluated
  verdict: Verdict | null;
  evaluationError: string | null;
  // Recorded revocation reason on a denial, null on approval
  reason: string | null;
}

type DecisionBasis =
  | { verdict: Verdict; evaluationError: null }
  | { verdict: null; evaluationError: string };

interface TransitionRequest {
  target: AuthorizationState;
  patch: Omit<AuthorizationTransitionPatch, 'state'>;
  action: AuditAction;
  detail?: string | null;
  notes?: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * Authorization State Machine
 *
 * Owns every write to an Authorization. Requests are serialized per
 * (person, facility) and transitions per authorization id; the relational
 * repository adds compare-and-swap on `version` and a partial unique index
 * so the one-open-record rule also holds across processes.
 *
 * Each transition writes exactly one audit entry, in the same unit of work
 * as the state change. No-ops write none.
 * Role checks are not made here.
 */
@Injectable()
export class AuthorizationDomainService {
  private readonly logger = new Logger(AuthorizationDomainService.name);
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly authorizationRepository: AuthorizationRepositoryPort,
    private readonly unitOfWork: AuthorizationUnitOfWork,
    private readonly personRepository: PersonRepositoryPort,
    private readonly facilityRepository: FacilityRepositoryPort,
    private readonly evaluationService: ComplianceEvaluationService,
    private readonly settingsService: ComplianceSettingsService,
    private readonly auditService: AuditService,
    private readonly clock: Clock,
  ) {}

  /**
   * Open a pending authorization for the pair.
   *
   * @throws DuplicateRequestError if a pending or active record exists
   */
  async requestAccess(
    personId: number,
    facilityId: number,
    actor: Actor,
  ): Promise<Authorization> {
    const requesterId = actorPersonId(actor);
    if (requesterId === null) {
      throw new UnauthorizedActionError('Access requests must be made by a person');
    }
    if (!(await this.personRepository.findById(personId))) {
      throw new EntityNotFoundError('Person', personId);
    }
    if (!(await this.facilityRepository.findById(facilityId))) {
      throw new EntityNotFoundError('Facility', facilityId);
    }

    return this.locks.runExclusive(`pair:${personId}:${facilityId}`, async () => {
      const open = await this.authorizationRepository.findOpenForPair(
        personId,
        facilityId,
      );
      if (open) {
        throw new DuplicateRequestError(
          `Person ${personId} already has a ${open.state} authorization for facility ${facilityId}`,
          { authorizationId: open.id, state: open.state },
        );
      }

      const previous = await this.authorizationRepository.findLatestForPair(
        personId,
        facilityId,
      );
      const requestedAt = this.clock.now();
      return this.unitOfWork.run(async (scope) => {
        const authorization = await scope.authorizations.create({
          personId,
          facilityId,
          requestedAt,
          requestedById: requesterId,
          previousAuthorizationId: previous?.id ?? null,
        });

        await this.auditService.record(
          {
            actor,
            entityType: AuditEntityType.AUTHORIZATION,
            entityId: authorization.id,
            action: AuditAction.REQUEST_ACCESS,
            priorState: previous ? AuthorizationState.REVOKED : null,
            newState: AuthorizationState.PENDING,
            occurredAt: requestedAt,
            metadata: {
              personId,
              facilityId,
              previousAuthorizationId: previous?.id ?? null,
            },
          },
          scope.audit,
        );

        return authorization;
      });
    });
  }

  /**
   * Drive an authorization from a verdict.
   *
   * - pending + qualified: active
   * - pending + not qualified: unchanged, or revoked when the autocheck actor
   *   applies it and `autoDenyOnAutocheck` is set
   * - active + qualified: no-op
   * - active + not qualified: revoked with the deficiency list as reason
   * - revoked + qualified: IllegalTransitionError (request again instead)
   * - revoked + not qualified: no-op
   */
  async applyVerdict(
    authorizationId: number,
    verdict: Verdict,
    actor: Actor,
    asOf: Date = this.clock.now(),
    settings: ComplianceSettings = this.settingsService.snapshot(),
  ): Promise<TransitionOutcome> {
    return this.locks.runExclusive(`authorization:${authorizationId}`, async () => {
      const current = await this.loadOrThrow(authorizationId);
      const system = isAutocheckActor(actor);
      const reason = formatDeficiencies(verdict.reasons);
      const metadata = {
        verdictAsOf: verdict.asOf,
        qualified: verdict.qualified,
        graceInEffect: verdict.graceInEffect.map((notice) => notice.course.code),
      };

      switch (current.state) {
        case AuthorizationState.PENDING:
          if (verdict.qualified) {
            return this.transitionLocked(current, actor, asOf, {
              target: AuthorizationState.ACTIVE,
              patch: this.activationPatch(actor, asOf, false),
              action: system ? AuditAction.AUTO_ACTIVATE : AuditAction.ACTIVATE,
              metadata,
            });
          }
          if (system && settings.autoDenyOnAutocheck) {
            return this.transitionLocked(current, actor, asOf, {
              target: AuthorizationState.REVOKED,
              patch: this.revocationPatch(actor, asOf, reason),
              action: AuditAction.AUTO_DENY,
              detail: reason,
              metadata,
            });
          }
          return this.unchanged(current);

        case AuthorizationState.ACTIVE:
          if (verdict.qualified) {
            return this.unchanged(current);
          }
          return this.transitionLocked(current, actor, asOf, {
            target: AuthorizationState.REVOKED,
            patch: this.revocationPatch(actor, asOf, reason),
            action: system ? AuditAction.AUTO_REVOKE : AuditAction.REVOKE,
            detail: reason,
            metadata,
          });
      }

      // revoked records never reopen
      if (verdict.qualified) {
        AuthorizationStateMachine.validateTransition(
          current.state,
          AuthorizationState.ACTIVE,
        );
      }
      return this.unchanged(current);
    });
  }

  /**
   * Approve or deny a pending authorization.
   *
   * The verdict is computed first, outside the lock. Approving against a
   * disqualifying verdict is allowed and flagged as a manual override; a
   * denial records the deficiency list as the reason. When the catalogue
   * cannot be evaluated the decision still goes through: an approval is an
   * override and a denial records the evaluation error as its reason.
   */
  async manualDecision(
    authorizationId: number,
    approve: boolean,
    actor: Actor,
    asOf: Date = this.clock.now(),
    notes?: string,
  ): Promise<ManualDecisionOutcome> {
    const snapshot = await this.loadOrThrow(authorizationId);
    this.assertPendingForDecision(snapshot, approve);
    const basis = await this.decisionBasis(snapshot, asOf);
    const { verdict, evaluationError } = basis;
    // null when qualified
    let disqualification: string | null;
    if (basis.verdict === null) {
      disqualification = basis.evaluationError;
    } else {
      disqualification = basis.verdict.qualified
        ? null
        : formatDeficiencies(basis.verdict.reasons);
    }

    return this.locks.runExclusive(`authorization:${authorizationId}`, async () => {
      const current = await this.loadOrThrow(authorizationId);
      this.assertPendingForDecision(current, approve);

      const metadata: Record<string, unknown> = {
        verdictAsOf: verdict ? verdict.asOf : toCalendarDay(asOf),
        qualified: verdict ? verdict.qualified : null,
      };
      if (evaluationError !== null) {
        metadata.evaluationError = evaluationError;
      }

      if (approve) {
        const override = disqualification !== null;
        const outcome = await this.transitionLocked(current, actor, asOf, {
          target: AuthorizationState.ACTIVE,
          patch: {
            ...this.activationPatch(actor, asOf, override),
            decisionNotes: notes ?? null,
          },
          action: override
            ? AuditAction.MANUAL_OVERRIDE
            : AuditAction.MANUAL_APPROVE,
          detail: disqualification,
          notes,
          metadata: { ...metadata, manualOverride: override },
        });
        if (override) {
          this.logger.warn(
            `Authorization ${authorizationId} approved by ${describeActor(actor)} despite: ${disqualification}`,
          );
        }
        return { ...outcome, verdict, evaluationError, reason: null };
      }

      const reason = disqualification ?? MANUAL_DENY_REASON;
      const outcome = await this.transitionLocked(current, actor, asOf, {
        target: AuthorizationState.REVOKED,
        patch: {
          ...this.revocationPatch(actor, asOf, reason),
          decisionNotes: notes ?? null,
        },
        action: AuditAction.MANUAL_DENY,
        detail: reason,
        notes,
        metadata,
      });
      return { ...outcome, verdict, evaluationError, reason };
    });
  }

  /**
   * Withdraw a pending request (pending → revoked, reason `user_cancelled`).
   */
  async cancelRequest(
    authorizationId: number,
    actor: Actor,
    asOf: Date = this.clock.now(),
  ): Promise<TransitionOutcome> {
    return this.locks.runExclusive(`authorization:${authorizationId}`, async () => {
      const current = await this.loadOrThrow(authorizationId);
      if (current.state !== AuthorizationState.PENDING) {
        throw new IllegalTransitionError(
          current.state,
          AuthorizationState.REVOKED,
          `Only pending requests can be cancelled (authorization ${authorizationId} is ${current.state})`,
        );
      }
      return this.transitionLocked(current, actor, asOf, {
        target: AuthorizationState.REVOKED,
        patch: this.revocationPatch(actor, asOf, CANCELLED_REASON),
        action: AuditAction.CANCEL_REQUEST,
        detail: CANCELLED_REASON,
      });
    });
  }

  /**
   * Revoke an active authorization regardless of compliance. Revoking an
   * already revoked record is a no-op.
   */
  async revokeAccess(
    authorizationId: number,
    actor: Actor,
    asOf: Date = this.clock.now(),
    notes?: string,
  ): Promise<TransitionOutcome> {
    return this.locks.runExclusive(`authorization:${authorizationId}`, async () => {
      const current = await this.loadOrThrow(authorizationId);
      if (current.state === AuthorizationState.REVOKED) {
        return this.unchanged(current);
      }
      if (current.state === AuthorizationState.PENDING) {
        throw new IllegalTransitionError(
          current.state,
          AuthorizationState.REVOKED,
          `Authorization ${authorizationId} is pending; deny or cancel it instead`,
        );
      }
      return this.transitionLocked(current, actor, asOf, {
        target: AuthorizationState.REVOKED,
        patch: {
          ...this.revocationPatch(actor, asOf, MANUAL_REVOKE_REASON),
          decisionNotes: notes ?? null,
        },
        action: AuditAction.MANUAL_REVOKE,
        detail: MANUAL_REVOKE_REASON,
        notes,
      });
    });
  }

  async getAuthorization(authorizationId: number): Promise<Authorization> {
    return this.loadOrThrow(authorizationId);
  }

  /**
   * Audit entries of one authorization, oldest first.
   */
  async getHistory(authorizationId: number): Promise<AuditEntry[]> {
    await this.loadOrThrow(authorizationId);
    return this.auditService.history(
      AuditEntityType.AUTHORIZATION,
      authorizationId,
    );
  }

  private async loadOrThrow(authorizationId: number): Promise<Authorization> {
    const authorization =
      await this.authorizationRepository.findById(authorizationId);
    if (!authorization) {
      throw new EntityNotFoundError('Authorization', authorizationId);
    }
    return authorization;
  }

  private async decisionBasis(
    authorization: Authorization,
    asOf: Date,
  ): Promise<DecisionBasis> {
    try {
      const verdict = await this.evaluationService.evaluate(
        authorization.personId,
        authorization.facilityId,
        asOf,
      );
      return { verdict, evaluationError: null };
    } catch (error) {
      if (!(error instanceof EvaluationError)) {
        throw error;
      }
      this.logger.warn(
        `Authorization ${authorization.id} decided without a verdict: ${error.message}`,
      );
      return { verdict: null, evaluationError: error.message };
    }
  }

  private assertPendingForDecision(
    authorization: Authorization,
    approve: boolean,
  ): void {
    if (authorization.state !== AuthorizationState.PENDING) {
      throw new IllegalTransitionError(
        authorization.state,
        approve ? AuthorizationState.ACTIVE : AuthorizationState.REVOKED,
        `Manual decisions apply to pending authorizations only (authorization ${authorization.id} is ${authorization.state})`,
      );
    }
  }

  private activationPatch(
    actor: Actor,
    at: Date,
    manualOverride: boolean,
  ): Omit<AuthorizationTransitionPatch, 'state'> {
    return {
      activatedAt: at,
      activatedByType: actor.type,
      activatedById: actorPersonId(actor),
      manualOverride,
    };
  }

  private revocationPatch(
    actor: Actor,
    at: Date,
    reason: string,
  ): Omit<AuthorizationTransitionPatch, 'state'> {
    return {
      revokedAt: at,
      revokedByType: actor.type,
      revokedById: actorPersonId(actor),
      revocationReason: reason,
    };
  }

  private unchanged(authorization: Authorization): TransitionOutcome {
    return { authorization, changed: false, action: null };
  }

  /**
   * Caller must hold the authorization's lock.
   */
  private async transitionLocked(
    current: Authorization,
    actor: Actor,
    at: Date,
    request: TransitionRequest,
  ): Promise<TransitionOutcome> {
    AuthorizationStateMachine.validateTransition(current.state, request.target);

    const updated = await this.unitOfWork.run(async (scope) => {
      const written = await scope.authorizations.transition(
        current.id,
        current.version,
        { ...request.patch, state: request.target },
      );
      if (!written) {
        throw new IllegalTransitionError(
          current.state,
          request.target,
          `Authorization ${current.id} was modified concurrently; reload and retry`,
        );
      }

      await this.auditService.record(
        {
          actor,
          entityType: AuditEntityType.AUTHORIZATION,
          entityId: current.id,
          action: request.action,
          priorState: current.state,
          newState: written.state,
          detail: request.detail ?? null,
          notes: request.notes,
          occurredAt: at,
          metadata: {
            personId: current.personId,
            facilityId: current.facilityId,
            version: written.version,
            ...request.metadata,
          },
        },
        scope.audit,
      );
      return written;
    });

    this.logger.log(
      `Authorization ${current.id}: ${current.state} → ${updated.state} (${request.action} by ${describeActor(actor)})`,
    );

    return { authorization: updated, changed: true, action: request.action };
  }
}
