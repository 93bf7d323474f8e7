import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { ReportsService } from './reports.service';
import {
  AcknowledgmentReportQueryDto,
  ComplianceStatusQueryDto,
  ExpiringTrainingQueryDto,
} from './dto/report-query.dto';
import {
  AcknowledgmentReportDto,
  ComplianceStatusReportDto,
  ExpiringTrainingReportDto,
} from './dto/report-response.dto';
import { Clock } from '../clock/clock';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

@ApiTags('Reports')
@Controller({ path: 'reports', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles(RoleEnum.approver, RoleEnum.administrator)
@ApiBearerAuth()
export class ReportsController {
  constructor(
    private readonly reportsService: ReportsService,
    private readonly clock: Clock,
  ) {}

  @Get('compliance-status')
  @ApiOperation({ summary: 'Open authorizations with their current verdict' })
  @ApiOkResponse({ type: ComplianceStatusReportDto })
  async complianceStatus(
    @Query() query: ComplianceStatusQueryDto,
  ): Promise<ComplianceStatusReportDto> {
    return this.reportsService.complianceStatus(
      query.asOf ?? this.clock.now(),
      query.facilityId,
    );
  }

  @Get('expiring-training')
  @ApiOperation({ summary: 'Training expiring soon or already expired' })
  @ApiOkResponse({ type: ExpiringTrainingReportDto })
  async expiringTraining(
    @Query() query: ExpiringTrainingQueryDto,
  ): Promise<ExpiringTrainingReportDto> {
    return this.reportsService.expiringTraining(
      query.asOf ?? this.clock.now(),
      query.windowDays,
    );
  }

  @Get('acknowledgments')
  @ApiOperation({ summary: 'Document acknowledgments, newest first' })
  @ApiOkResponse({ type: AcknowledgmentReportDto })
  async acknowledgments(
    @Query() query: AcknowledgmentReportQueryDto,
  ): Promise<AcknowledgmentReportDto> {
    return this.reportsService.acknowledgments(query.facilityId);
  }
}
