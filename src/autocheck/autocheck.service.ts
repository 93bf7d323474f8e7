import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../config/config.type';
import { Clock } from '../clock/clock';
import { AuthorizationRepositoryPort } from '../authorizations/domain/repositories/authorization.repository.port';
import { AuthorizationDomainService } from '../authorizations/domain/services/authorization.domain.service';
import { Authorization } from '../authorizations/domain/entities/authorization.entity';
import { AuthorizationState } from '../authorizations/domain/enums/authorization-state.enum';
import { ComplianceEvaluationService } from '../compliance/domain/services/compliance-evaluation.domain.service';
import {
  ComplianceSettings,
  ComplianceSettingsService,
} from '../compliance/domain/services/compliance-settings.service';
import { toCalendarDay } from '../compliance/domain/utils/calendar-day.util';
import { AUTOCHECK_ACTOR } from '../auth/domain/actor';
import {
  AuditAction,
  AuditEntityType,
  AuditService,
} from '../audit/audit.service';
import {
  ComplianceErrorCode,
  isComplianceError,
} from '../utils/errors/compliance-errors';
import { Semaphore } from '../utils/semaphore';
import {
  AutocheckFailure,
  AutocheckOptions,
  AutocheckSummary,
  AutocheckTransition,
} from './autocheck.types';

const DEFAULT_CONCURRENCY = 4;

const byAuthorizationId = (
  a: { authorizationId: number },
  b: { authorizationId: number },
): number => a.authorizationId - b.authorizationId;

/**
 * Autocheck Orchestrator
 *
 * Re-evaluates every pending and active authorization as of one instant and
 * applies the verdicts as the system actor. Records are independent: a
 * failure is captured in the summary and the run continues. Cancellation is
 * cooperative; records not yet started when the signal fires are reported
 * as cancelled.
 *
 * A second run over unchanged data grants and revokes nothing.
 */
@Injectable()
export class AutocheckService {
  private readonly logger = new Logger(AutocheckService.name);

  constructor(
    private readonly authorizationRepository: AuthorizationRepositoryPort,
    private readonly authorizationService: AuthorizationDomainService,
    private readonly evaluationService: ComplianceEvaluationService,
    private readonly settingsService: ComplianceSettingsService,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly clock: Clock,
  ) {}

  async runAutocheck(
    asOf: Date = this.clock.now(),
    options: AutocheckOptions = {},
  ): Promise<AutocheckSummary> {
    const runId = randomUUID();
    const startedAt = this.clock.now();
    const settings = this.settingsService.snapshot();
    const concurrency =
      options.concurrency ??
      this.configService.get('compliance.autocheckConcurrency', {
        infer: true,
      }) ??
      DEFAULT_CONCURRENCY;
    const semaphore = new Semaphore(concurrency);

    const records = await this.authorizationRepository.findByStates([
      AuthorizationState.PENDING,
      AuthorizationState.ACTIVE,
    ]);
    this.logger.log(
      `Autocheck ${runId} started: ${records.length} records as of ${toCalendarDay(asOf)} (concurrency ${concurrency})`,
    );

    const granted: AutocheckTransition[] = [];
    const revoked: AutocheckTransition[] = [];
    const denied: AutocheckTransition[] = [];
    const unchanged: number[] = [];
    const errors: AutocheckFailure[] = [];
    const cancelled: number[] = [];

    await Promise.all(
      records.map((record) =>
        semaphore.run(async () => {
          if (options.signal?.aborted) {
            cancelled.push(record.id);
            return;
          }
          try {
            const result = await this.checkOne(record, asOf, settings);
            if (!result) {
              unchanged.push(record.id);
            } else if (result.action === AuditAction.AUTO_ACTIVATE) {
              granted.push(result.transition);
            } else if (result.action === AuditAction.AUTO_DENY) {
              denied.push(result.transition);
            } else {
              revoked.push(result.transition);
            }
          } catch (error) {
            errors.push(this.toFailure(record.id, error));
          }
        }),
      ),
    );

    const summary: AutocheckSummary = {
      runId,
      asOf: toCalendarDay(asOf),
      startedAt,
      finishedAt: this.clock.now(),
      examined: records.length - cancelled.length,
      granted: granted.sort(byAuthorizationId),
      revoked: revoked.sort(byAuthorizationId),
      denied: denied.sort(byAuthorizationId),
      unchanged: unchanged.sort((a, b) => a - b),
      errors: errors.sort(byAuthorizationId),
      cancelled: cancelled.sort((a, b) => a - b),
      runAudited: false,
    };
    summary.runAudited = await this.recordRun(summary, settings);

    this.logger.log(
      `Autocheck ${runId} finished: granted=${summary.granted.length} revoked=${summary.revoked.length} denied=${summary.denied.length} unchanged=${summary.unchanged.length} errors=${summary.errors.length} cancelled=${summary.cancelled.length}`,
    );

    return summary;
  }

  /**
   * The per-record transitions are already committed with their own
   * entries, so a failed run entry is logged and reported, not thrown.
   */
  private async recordRun(
    summary: AutocheckSummary,
    settings: ComplianceSettings,
  ): Promise<boolean> {
    try {
      await this.auditService.record({
        actor: AUTOCHECK_ACTOR,
        entityType: AuditEntityType.AUTOCHECK_RUN,
        entityId: summary.runId,
        action: AuditAction.AUTOCHECK_COMPLETED,
        occurredAt: summary.finishedAt,
        metadata: {
          asOf: summary.asOf,
          examined: summary.examined,
          granted: summary.granted.length,
          revoked: summary.revoked.length,
          denied: summary.denied.length,
          unchanged: summary.unchanged.length,
          errors: summary.errors.length,
          cancelled: summary.cancelled.length,
          autoDenyOnAutocheck: settings.autoDenyOnAutocheck,
        },
      });
      return true;
    } catch (error) {
      this.logger.error(
        `Autocheck ${summary.runId} could not be audited: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return false;
    }
  }

  private async checkOne(
    record: Authorization,
    asOf: Date,
    settings: ComplianceSettings,
  ): Promise<{ action: AuditAction; transition: AutocheckTransition } | null> {
    const verdict = await this.evaluationService.evaluate(
      record.personId,
      record.facilityId,
      asOf,
    );
    const outcome = await this.authorizationService.applyVerdict(
      record.id,
      verdict,
      AUTOCHECK_ACTOR,
      asOf,
      settings,
    );
    if (!outcome.changed || !outcome.action) {
      return null;
    }
    return {
      action: outcome.action,
      transition: {
        authorizationId: record.id,
        personId: record.personId,
        facilityId: record.facilityId,
        from:
          outcome.action === AuditAction.AUTO_REVOKE
            ? AuthorizationState.ACTIVE
            : AuthorizationState.PENDING,
        to: outcome.authorization.state,
        reason: outcome.authorization.revocationReason,
      },
    };
  }

  private toFailure(authorizationId: number, error: unknown): AutocheckFailure {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Autocheck failed for authorization ${authorizationId}: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return {
      authorizationId,
      code: isComplianceError(error)
        ? error.code
        : ComplianceErrorCode.EVALUATION_ERROR,
      message,
    };
  }
}
