import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { TrainingDomainService } from './domain/services/training.domain.service';
import { RecordCompletionDto } from './dto/record-completion.dto';
import { CompletionResponseDto } from './dto/completion-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

@ApiTags('Training')
@Controller({ path: 'people/:personId/completions', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class CompletionsController {
  constructor(private readonly trainingService: TrainingDomainService) {}

  @Post()
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Record a training completion',
    description:
      'Idempotent per (person, course, day): repeating returns the existing record.',
  })
  @ApiCreatedResponse({ type: CompletionResponseDto })
  @ApiNotFoundResponse({ description: 'Person or course not found' })
  async record(
    @Request() req: AuthenticatedRequest,
    @Param('personId', ParseIntPipe) personId: number,
    @Body() dto: RecordCompletionDto,
  ): Promise<CompletionResponseDto> {
    const { completion } = await this.trainingService.recordCompletion(
      {
        personId,
        courseId: dto.courseId,
        completedOn: dto.completedOn,
        certificateKey: dto.certificateKey,
      },
      extractActorFromRequest(req),
    );
    return CompletionResponseDto.fromDomain(completion);
  }

  @Get()
  @Roles(RoleEnum.approver, RoleEnum.administrator)
  @ApiOperation({ summary: 'Completion history, newest first' })
  @ApiOkResponse({ type: [CompletionResponseDto] })
  async list(
    @Param('personId', ParseIntPipe) personId: number,
  ): Promise<CompletionResponseDto[]> {
    const completions = await this.trainingService.listCompletions(personId);
    return completions.map(CompletionResponseDto.fromDomain);
  }
}
