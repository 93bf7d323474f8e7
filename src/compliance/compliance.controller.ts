import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { ComplianceEvaluationService } from './domain/services/compliance-evaluation.domain.service';
import { EvaluateQueryDto } from './dto/evaluate-query.dto';
import { VerdictResponseDto } from './dto/verdict-response.dto';
import { Clock } from '../clock/clock';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

@ApiTags('Compliance')
@Controller({ path: 'compliance', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class ComplianceController {
  constructor(
    private readonly evaluationService: ComplianceEvaluationService,
    private readonly clock: Clock,
  ) {}

  @Get('evaluate')
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @ApiOperation({
    summary: 'Evaluate a person against a facility',
    description: 'Read-only. Grace notices are informational and never deny.',
  })
  @ApiOkResponse({ type: VerdictResponseDto })
  @ApiNotFoundResponse({ description: 'Person or facility not found' })
  @ApiUnprocessableEntityResponse({
    description: 'Facility catalogue references a missing course',
  })
  async evaluate(@Query() query: EvaluateQueryDto): Promise<VerdictResponseDto> {
    const verdict = await this.evaluationService.evaluate(
      query.personId,
      query.facilityId,
      query.asOf ?? this.clock.now(),
    );
    return VerdictResponseDto.fromDomain(
      query.personId,
      query.facilityId,
      verdict,
    );
  }
}
