// src/documents/documents.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
} from '@nestjs/common';
import type { DocumentKind } from '../common/events/domain-events';
import { DocumentsService } from './documents.service';
import { DocumentKindPipe } from './document-kind.pipe';
import { AddLineDto } from './dto/add-line.dto';
import { UpdateLineDto } from './dto/update-line.dto';
import { SetDiscountDto } from './dto/set-discount.dto';

@Controller('documents/:kind/:id')
export class DocumentsController {
  constructor(private readonly svc: DocumentsService) {}

  @Get()
  get(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.svc.getDocument(kind, id);
  }

  @Get('analysis')
  analysis(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.svc.analyze(kind, id);
  }

  // =========================
  // Líneas
  // =========================
  @Post('lines')
  addLine(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AddLineDto,
  ) {
    return this.svc.addLine(kind, id, dto);
  }

  @Patch('lines/:lineId')
  updateLine(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
    @Param('lineId', ParseIntPipe) lineId: number,
    @Body() dto: UpdateLineDto,
  ) {
    return this.svc.updateLine(kind, id, lineId, dto);
  }

  @Delete('lines/:lineId')
  removeLine(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
    @Param('lineId', ParseIntPipe) lineId: number,
  ) {
    return this.svc.removeLine(kind, id, lineId);
  }

  @Put('discount')
  setDiscount(
    @Param('kind', DocumentKindPipe) kind: DocumentKind,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SetDiscountDto,
  ) {
    return this.svc.setDocumentDiscount(kind, id, dto.discountPercent);
  }
}
