import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { AutocheckService } from './autocheck.service';
import { RunAutocheckDto } from './dto/run-autocheck.dto';
import { AutocheckSummaryResponseDto } from './dto/autocheck-summary-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

@ApiTags('Autocheck')
@Controller({ path: 'autocheck', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class AutocheckController {
  constructor(private readonly autocheckService: AutocheckService) {}

  @Post()
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Run autocheck now',
    description:
      'Re-evaluates every pending and active authorization. Per-record failures are listed in `errors`.',
  })
  @ApiOkResponse({ type: AutocheckSummaryResponseDto })
  @ApiForbiddenResponse({ description: 'Approver or administrator role required' })
  async run(@Body() dto: RunAutocheckDto): Promise<AutocheckSummaryResponseDto> {
    const summary = await this.autocheckService.runAutocheck(
      dto.asOf ? new Date(dto.asOf) : undefined,
      { concurrency: dto.concurrency },
    );
    return AutocheckSummaryResponseDto.fromSummary(summary);
  }
}
