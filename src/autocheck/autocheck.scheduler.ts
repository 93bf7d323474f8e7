import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import { AutocheckService } from './autocheck.service';
import { AutocheckSummary } from './autocheck.types';

/**
 * Nightly autocheck.
 *
 * Disabled with COMPLIANCE_AUTOCHECK_ENABLED=false. A run still in flight at
 * shutdown is cancelled; records it had not reached are left for the next run.
 */
@Injectable()
export class AutocheckScheduler implements OnApplicationShutdown {
  private readonly logger = new Logger(AutocheckScheduler.name);
  private inFlight: AbortController | null = null;

  constructor(
    private readonly autocheckService: AutocheckService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  @Cron(CronExpression.EVERY_DAY_AT_2AM, {
    name: 'compliance-autocheck',
    timeZone: 'UTC',
  })
  async handleNightlyAutocheck(): Promise<AutocheckSummary | null> {
    const enabled = this.configService.get('compliance.autocheckEnabled', {
      infer: true,
    });
    if (enabled === false) {
      this.logger.debug('Scheduled autocheck disabled');
      return null;
    }
    if (this.inFlight) {
      this.logger.warn('Previous scheduled autocheck still running; skipping');
      return null;
    }

    const controller = new AbortController();
    this.inFlight = controller;
    try {
      return await this.autocheckService.runAutocheck(undefined, {
        signal: controller.signal,
      });
    } catch (error) {
      this.logger.error(
        'Scheduled autocheck failed',
        error instanceof Error ? error.stack : String(error),
      );
      return null;
    } finally {
      this.inFlight = null;
    }
  }

  onApplicationShutdown(): void {
    if (this.inFlight) {
      this.logger.warn('Cancelling in-flight autocheck for shutdown');
      this.inFlight.abort();
    }
  }
}
