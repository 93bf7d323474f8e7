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
import { ProceduralDocumentDomainService } from './domain/services/procedural-document.domain.service';
import { CreateDocumentDto } from './dto/create-document.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

@ApiTags('Documents')
@Controller({ path: 'facilities/:facilityId/documents', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class FacilityDocumentsController {
  constructor(
    private readonly documentService: ProceduralDocumentDomainService,
  ) {}

  @Post()
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a procedural document (version 1)' })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Facility not found' })
  async create(
    @Request() req: AuthenticatedRequest,
    @Param('facilityId', ParseIntPipe) facilityId: number,
    @Body() dto: CreateDocumentDto,
  ): Promise<DocumentResponseDto> {
    const document = await this.documentService.createDocument(
      facilityId,
      dto,
      extractActorFromRequest(req),
    );
    return DocumentResponseDto.fromDomain(document);
  }

  @Get()
  @ApiOkResponse({ type: [DocumentResponseDto] })
  async list(
    @Param('facilityId', ParseIntPipe) facilityId: number,
  ): Promise<DocumentResponseDto[]> {
    const documents = await this.documentService.listDocuments(facilityId);
    return documents.map((document) => DocumentResponseDto.fromDomain(document));
  }
}
