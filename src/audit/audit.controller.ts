import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuditQueryService } from './audit-query.service';
import { ListAuditEventsDto } from './dto/list-audit-events.dto';
import { AuditEventResponseDto } from './dto/audit-event-response.dto';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

@ApiTags('Audit')
@Controller({ path: 'audit/events', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class AuditController {
  constructor(private readonly auditQueryService: AuditQueryService) {}

  @Get()
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @ApiOperation({
    summary: 'Search audit trail',
    description: 'Newest entries first. Entries are read-only.',
  })
  @ApiOkResponse({ type: InfinityPaginationResponse(AuditEventResponseDto) })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  @ApiForbiddenResponse({ description: 'Approver or administrator role required' })
  async list(
    @Query() query: ListAuditEventsDto,
  ): Promise<InfinityPaginationResponseDto<AuditEventResponseDto>> {
    return this.auditQueryService.list(query);
  }
}
