import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
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
} from '@nestjs/swagger';
import { PeopleService } from './people.service';
import { CreatePersonDto } from './dto/create-person.dto';
import { UpdatePersonRoleDto } from './dto/update-person-role.dto';
import { PersonResponseDto } from './dto/person-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

@ApiTags('People')
@Controller({ path: 'people', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles(RoleEnum.administrator)
@ApiBearerAuth()
@ApiForbiddenResponse({ description: 'Administrator role required' })
export class PeopleController {
  constructor(private readonly peopleService: PeopleService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Provision a person' })
  @ApiCreatedResponse({ type: PersonResponseDto })
  @ApiConflictResponse({ description: 'Employee number or email already registered' })
  async create(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreatePersonDto,
  ): Promise<PersonResponseDto> {
    const person = await this.peopleService.create(
      dto,
      extractActorFromRequest(req),
    );
    return PersonResponseDto.fromDomain(person);
  }

  @Get(':id')
  @ApiOkResponse({ type: PersonResponseDto })
  @ApiNotFoundResponse({ description: 'Person not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<PersonResponseDto> {
    return PersonResponseDto.fromDomain(await this.peopleService.getById(id));
  }

  @Patch(':id/role')
  @ApiOperation({ summary: 'Change role' })
  @ApiOkResponse({ type: PersonResponseDto })
  @ApiNotFoundResponse({ description: 'Person not found' })
  async changeRole(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdatePersonRoleDto,
  ): Promise<PersonResponseDto> {
    const person = await this.peopleService.changeRole(
      id,
      dto.role,
      extractActorFromRequest(req),
    );
    return PersonResponseDto.fromDomain(person);
  }
}
