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
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { ProceduralDocumentDomainService } from './domain/services/procedural-document.domain.service';
import { DocumentsService } from './documents.service';
import { UploadVersionDto } from './dto/upload-version.dto';
import { AcknowledgeDocumentDto } from './dto/acknowledge-document.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { AcknowledgmentResponseDto } from './dto/acknowledgment-response.dto';
import { DocumentCurrencyResponseDto } from './dto/document-currency-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';

@ApiTags('Documents')
@Controller({ path: 'documents', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class DocumentsController {
  constructor(
    private readonly documentService: ProceduralDocumentDomainService,
    private readonly documentsService: DocumentsService,
  ) {}

  @Get(':id')
  @ApiOkResponse({ type: DocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DocumentResponseDto> {
    const document = await this.documentService.getDocument(id);
    const versions = await this.documentService.listVersions(id);
    return DocumentResponseDto.fromDomain(document, versions);
  }

  @Post(':id/versions')
  @Roles(RoleEnum.administrator)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Publish a new version',
    description:
      'Bumps currentVersion. Everyone must acknowledge again to stay current.',
  })
  @ApiCreatedResponse({ type: DocumentResponseDto })
  async uploadVersion(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UploadVersionDto,
  ): Promise<DocumentResponseDto> {
    const { document } = await this.documentService.uploadVersion(
      id,
      dto.artifactKey ?? null,
      extractActorFromRequest(req),
    );
    return DocumentResponseDto.fromDomain(
      document,
      await this.documentService.listVersions(id),
    );
  }

  @Post(':id/acknowledgments')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Acknowledge the current version',
    description: 'Idempotent per version.',
  })
  @ApiCreatedResponse({ type: AcknowledgmentResponseDto })
  @ApiForbiddenResponse({ description: 'Acknowledging for another person' })
  async acknowledge(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AcknowledgeDocumentDto,
  ): Promise<AcknowledgmentResponseDto> {
    return this.documentsService.acknowledge(
      id,
      extractActorFromRequest(req),
      dto.personId,
    );
  }

  @Get(':id/currency/:personId')
  @ApiOperation({ summary: 'Is the person current on this document?' })
  @ApiOkResponse({ type: DocumentCurrencyResponseDto })
  async currency(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Param('personId', ParseIntPipe) personId: number,
  ): Promise<DocumentCurrencyResponseDto> {
    return this.documentsService.currency(
      id,
      personId,
      extractActorFromRequest(req),
    );
  }
}
