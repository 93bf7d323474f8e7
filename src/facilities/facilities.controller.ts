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
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { FacilityDomainService } from './domain/services/facility.domain.service';
import { CreateFacilityDto } from './dto/create-facility.dto';
import { AddRequirementDto } from './dto/add-requirement.dto';
import { FacilityResponseDto } from './dto/facility-response.dto';
import { RequirementResponseDto } from './dto/requirement-response.dto';
import { MetricsHistoryQueryDto, SaveMetricsDto } from './dto/save-metrics.dto';
import { FacilityMetricsResponseDto } from './dto/facility-metrics-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { EntityNotFoundError } from '../utils/errors/compliance-errors';

@ApiTags('Facilities')
@Controller({ path: 'facilities', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class FacilitiesController {
  constructor(private readonly facilityService: FacilityDomainService) {}

  @Post()
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register a facility' })
  @ApiCreatedResponse({ type: FacilityResponseDto })
  @ApiConflictResponse({ description: 'Facility code already exists' })
  async create(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateFacilityDto,
  ): Promise<FacilityResponseDto> {
    const facility = await this.facilityService.createFacility(
      dto,
      extractActorFromRequest(req),
    );
    return FacilityResponseDto.fromDomain(facility, []);
  }

  @Get()
  @ApiOkResponse({ type: [FacilityResponseDto] })
  async list(): Promise<FacilityResponseDto[]> {
    const facilities = await this.facilityService.listFacilities();
    return Promise.all(
      facilities.map(async (facility) =>
        FacilityResponseDto.fromDomain(
          facility,
          await this.facilityService.listRequirements(facility.id),
        ),
      ),
    );
  }

  @Get(':id')
  @ApiOkResponse({ type: FacilityResponseDto })
  @ApiNotFoundResponse({ description: 'Facility not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<FacilityResponseDto> {
    const facility = await this.facilityService.getFacility(id);
    const requirements = await this.facilityService.listRequirements(id);
    return FacilityResponseDto.fromDomain(facility, requirements);
  }

  @Post(':id/requirements')
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Require a course for entry',
    description: 'One requirement per course; overrides are optional.',
  })
  @ApiCreatedResponse({ type: RequirementResponseDto })
  @ApiConflictResponse({ description: 'Course already required by this facility' })
  @ApiNotFoundResponse({ description: 'Facility or course not found' })
  async addRequirement(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AddRequirementDto,
  ): Promise<RequirementResponseDto> {
    const requirement = await this.facilityService.addRequirement(
      id,
      dto,
      extractActorFromRequest(req),
    );
    return RequirementResponseDto.fromDomain(requirement);
  }

  @Post(':id/metrics')
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Save the daily metrics of a facility',
    description:
      'Scores are clamped to 0..100. Saving the same day again overwrites it.',
  })
  @ApiOkResponse({ type: FacilityMetricsResponseDto })
  @ApiNotFoundResponse({ description: 'Facility not found' })
  async saveMetrics(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SaveMetricsDto,
  ): Promise<FacilityMetricsResponseDto> {
    const metrics = await this.facilityService.saveMetrics(
      id,
      dto,
      extractActorFromRequest(req),
    );
    return FacilityMetricsResponseDto.fromDomain(metrics);
  }

  @Get(':id/metrics')
  @ApiOperation({ summary: 'Daily metrics of a facility, newest first' })
  @ApiOkResponse({ type: [FacilityMetricsResponseDto] })
  @ApiNotFoundResponse({ description: 'Facility not found' })
  async metricsHistory(
    @Param('id', ParseIntPipe) id: number,
    @Query() query: MetricsHistoryQueryDto,
  ): Promise<FacilityMetricsResponseDto[]> {
    const history = await this.facilityService.metricsHistory(id, query.limit);
    return history.map((metrics) => FacilityMetricsResponseDto.fromDomain(metrics));
  }

  @Get(':id/metrics/latest')
  @ApiOperation({ summary: 'Most recent metrics of a facility' })
  @ApiOkResponse({ type: FacilityMetricsResponseDto })
  @ApiNotFoundResponse({ description: 'Facility or metrics not found' })
  async latestMetrics(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<FacilityMetricsResponseDto> {
    const metrics = await this.facilityService.latestMetrics(id);
    if (!metrics) {
      throw new EntityNotFoundError('FacilityMetrics', id);
    }
    return FacilityMetricsResponseDto.fromDomain(metrics);
  }
}
