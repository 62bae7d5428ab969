import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  NotFoundException,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { DocumentSummary, RetrievalHitPayload } from '@hotel-concierge/shared-types';

import { entityIdPipe } from '../common/pipes/entity-id.pipe';
import {
  DocumentDetail,
  DocumentsService,
  UploadResult,
  UploadedDocumentFile,
} from './documents.service';
import { SearchDocumentsDto } from './dto/search-documents.dto';
import { UploadDocumentDto } from './dto/upload-document.dto';
import { RetrievalService } from './retrieval.service';

@Controller('documents')
export class DocumentsController {
  constructor(
    private readonly documentsService: DocumentsService,
    private readonly retrievalService: RetrievalService,
  ) {}

  @Get()
  async list(): Promise<DocumentSummary[]> {
    return this.documentsService.listDocuments();
  }

  @Get('search')
  async search(
    @Query() query: SearchDocumentsDto,
  ): Promise<{ results: RetrievalHitPayload[]; query: string; total: number }> {
    const text = query.q ?? '';
    const results = await this.retrievalService.search(text, {
      category: query.category,
      limit: query.limit ?? 5,
    });

    return { results, query: text, total: results.length };
  }

  @Post()
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @UploadedFile() file: UploadedDocumentFile | undefined,
    @Body() body: UploadDocumentDto,
  ): Promise<UploadResult> {
    if (!file || !file.originalname) {
      throw new BadRequestException('No file selected');
    }

    if (!this.documentsService.isAllowedFile(file.originalname)) {
      throw new BadRequestException('Invalid file type. Please upload PDF, TXT, or DOCX files.');
    }

    return this.documentsService.uploadDocument(file, body);
  }

  @Get(':id')
  async detail(
    @Param('id', entityIdPipe('Document')) documentId: string,
  ): Promise<DocumentDetail> {
    const detail = await this.documentsService.getDocument(documentId);
    if (!detail) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    return detail;
  }

  @Get(':id/content')
  async content(
    @Param('id', entityIdPipe('Document')) documentId: string,
  ): Promise<{ content: string }> {
    const content = await this.documentsService.getDocumentContent(documentId);
    if (content === null) {
      throw new NotFoundException(`Document ${documentId} has no extracted content`);
    }

    return { content };
  }

  @Post(':id/reprocess')
  async reprocess(
    @Param('id', entityIdPipe('Document')) documentId: string,
  ): Promise<{ success: boolean }> {
    const success = await this.documentsService.reprocessDocument(documentId);
    if (success === null) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    return { success };
  }

  @Delete(':id')
  async remove(
    @Param('id', entityIdPipe('Document')) documentId: string,
  ): Promise<{ success: boolean }> {
    const deleted = await this.documentsService.deleteDocument(documentId);
    if (!deleted) {
      throw new NotFoundException(`Document ${documentId} not found`);
    }

    return { success: true };
  }
}
