import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';

export interface ComplianceSettings {
  readonly autoDenyOnAutocheck: boolean;
}

/**
 * Hands out immutable snapshots of the compliance policy. An autocheck run
 * takes one snapshot up front and applies it to every record.
 */
@Injectable()
export class ComplianceSettingsService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  snapshot(): ComplianceSettings {
    return Object.freeze({
      autoDenyOnAutocheck:
        this.configService.get('compliance.autoDenyOnAutocheck', {
          infer: true,
        }) ?? false,
    });
  }
}
