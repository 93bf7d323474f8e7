import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuthorizationsService } from './authorizations.service';
import { RequestAccessDto } from './dto/request-access.dto';
import { ManualDecisionDto } from './dto/manual-decision.dto';
import { RevokeAuthorizationDto } from './dto/revoke-authorization.dto';
import { ListAuthorizationsDto } from './dto/list-authorizations.dto';
import { AuthorizationResponseDto } from './dto/authorization-response.dto';
import { ManualDecisionResponseDto } from './dto/manual-decision-response.dto';
import { AuditEventResponseDto } from '../audit/dto/audit-event-response.dto';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

/**
 * Authorizations Controller
 *
 * Thin adapter over the state machine. Role rules that depend on the
 * record (own request, own authorization) are applied by the service.
 */
@ApiTags('Authorizations')
@Controller({ path: 'authorizations', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class AuthorizationsController {
  constructor(private readonly authorizationsService: AuthorizationsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Request access to a facility' })
  @ApiCreatedResponse({ type: AuthorizationResponseDto })
  @ApiConflictResponse({ description: 'A pending or active authorization already exists' })
  @ApiNotFoundResponse({ description: 'Person or facility not found' })
  async request(
    @Request() req: AuthenticatedRequest,
    @Body() dto: RequestAccessDto,
  ): Promise<AuthorizationResponseDto> {
    return this.authorizationsService.requestAccess(
      dto,
      extractActorFromRequest(req),
    );
  }

  @Get()
  @ApiOperation({ summary: 'List authorizations, newest first' })
  @ApiOkResponse({ type: InfinityPaginationResponse(AuthorizationResponseDto) })
  async list(
    @Request() req: AuthenticatedRequest,
    @Query() query: ListAuthorizationsDto,
  ): Promise<InfinityPaginationResponseDto<AuthorizationResponseDto>> {
    return this.authorizationsService.list(query, extractActorFromRequest(req));
  }

  @Get(':id')
  @ApiOkResponse({ type: AuthorizationResponseDto })
  @ApiNotFoundResponse({ description: 'Authorization not found' })
  async findOne(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuthorizationResponseDto> {
    return this.authorizationsService.get(id, extractActorFromRequest(req));
  }

  @Get(':id/audit')
  @ApiOperation({ summary: 'Audit history, oldest first' })
  @ApiOkResponse({ type: [AuditEventResponseDto] })
  async history(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuditEventResponseDto[]> {
    return this.authorizationsService.history(id, extractActorFromRequest(req));
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a pending request' })
  @ApiOkResponse({ type: AuthorizationResponseDto })
  @ApiConflictResponse({ description: 'Authorization is not pending' })
  async cancel(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AuthorizationResponseDto> {
    return this.authorizationsService.cancelRequest(
      id,
      extractActorFromRequest(req),
    );
  }

  @Post(':id/decision')
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Approve or deny a pending request',
    description:
      'Approving a non-compliant request is recorded as a manual override. Denials return the deficiency reason.',
  })
  @ApiOkResponse({ type: ManualDecisionResponseDto })
  @ApiForbiddenResponse({ description: 'Approver or administrator role required' })
  @ApiConflictResponse({ description: 'Authorization is not pending' })
  async decide(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ManualDecisionDto,
  ): Promise<ManualDecisionResponseDto> {
    return this.authorizationsService.decide(
      id,
      dto,
      extractActorFromRequest(req),
    );
  }

  @Post(':id/revoke')
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Revoke active access' })
  @ApiOkResponse({ type: AuthorizationResponseDto })
  @ApiForbiddenResponse({ description: 'Approver or administrator role required' })
  async revoke(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: RevokeAuthorizationDto,
  ): Promise<AuthorizationResponseDto> {
    return this.authorizationsService.revoke(
      id,
      extractActorFromRequest(req),
      dto.notes,
    );
  }
}
