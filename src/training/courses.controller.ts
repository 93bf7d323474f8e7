import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { TrainingDomainService } from './domain/services/training.domain.service';
import { CreateCourseDto } from './dto/create-course.dto';
import { CourseResponseDto } from './dto/course-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

@ApiTags('Training')
@Controller({ path: 'courses', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class CoursesController {
  constructor(private readonly trainingService: TrainingDomainService) {}

  @Post()
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a course to the catalogue' })
  @ApiCreatedResponse({ type: CourseResponseDto })
  @ApiConflictResponse({ description: 'Course code already exists' })
  async create(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateCourseDto,
  ): Promise<CourseResponseDto> {
    const course = await this.trainingService.createCourse(
      dto,
      extractActorFromRequest(req),
    );
    return CourseResponseDto.fromDomain(course);
  }

  @Get()
  @ApiOkResponse({ type: [CourseResponseDto] })
  async list(): Promise<CourseResponseDto[]> {
    const courses = await this.trainingService.listCourses();
    return courses.map(CourseResponseDto.fromDomain);
  }
}
