// src/documents/document-kind.pipe.ts
import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import type { DocumentKind } from '../common/events/domain-events';

export const DOCUMENT_KINDS: readonly DocumentKind[] = [
  'quote',
  'order',
  'invoice',
  'purchase_order',
];

export function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KINDS.some((k) => k === value);
}

@Injectable()
export class DocumentKindPipe implements PipeTransform<string, DocumentKind> {
  transform(value: string): DocumentKind {
    if (!isDocumentKind(value)) {
      throw new BadRequestException(
        `Tipo de documento inválido: ${value} (usa ${DOCUMENT_KINDS.join(', ')})`,
      );
    }
    return value;
  }
}
