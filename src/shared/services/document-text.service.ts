import { Injectable } from '@nestjs/common'
import path from 'path'
import * as mammoth from 'mammoth'
import envConfig from '../config'
import { LoggerService } from './logger.service'

export const DocumentTextError = {
  UNSUPPORTED_TYPE: 'DOCUMENT_UNSUPPORTED_TYPE',
  UNREADABLE: 'DOCUMENT_UNREADABLE',
  EMPTY_TEXT: 'DOCUMENT_EMPTY_TEXT',
} as const

export type DocumentKind = 'pdf' | 'docx' | 'text'

const KIND_BY_EXTENSION: Record<string, DocumentKind> = {
  '.pdf': 'pdf',
  '.docx': 'docx',
  '.txt': 'text',
}

const KIND_BY_MIME_TYPE: Record<string, DocumentKind> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'text',
}

/**
 * DocumentTextService
 *
 * Purpose: Convert uploaded resume bytes (PDF, DOCX, TXT) into raw text deterministically.
 *
 * Allowed logic:
 * - Deterministic document → text extraction
 * - Normalization (whitespace collapse) as deterministic preprocessing
 *
 * Forbidden logic:
 * - Any rule evaluation
 * - Any inference / AI
 */
@Injectable()
export class DocumentTextService {
  constructor(private readonly logger: LoggerService) {}

  /**
   * Extract text from an uploaded document
   * @throws Error with a DocumentTextError message
   */
  async extractText(buffer: Buffer, fileName: string, mimeType?: string): Promise<string> {
    const kind = this.detectKind(fileName, mimeType)
    if (!kind) {
      throw new Error(DocumentTextError.UNSUPPORTED_TYPE)
    }

    let rawText: string
    try {
      rawText = await this.readRaw(kind, buffer)
    } catch (error) {
      this.logger.logError(error, {
        service: 'DocumentTextService',
        operation: 'extractText',
        kind,
      })
      throw new Error(DocumentTextError.UNREADABLE)
    }

    const normalizedText = this.normalizeText(rawText)

    if (normalizedText.length < envConfig.MIN_RESUME_TEXT_LENGTH) {
      throw new Error(DocumentTextError.EMPTY_TEXT)
    }

    return normalizedText
  }

  detectKind(fileName: string, mimeType?: string): DocumentKind | null {
    const byExtension = KIND_BY_EXTENSION[path.extname(fileName).toLowerCase()]
    if (byExtension) return byExtension
    return (mimeType && KIND_BY_MIME_TYPE[mimeType]) || null
  }

  private async readRaw(kind: DocumentKind, buffer: Buffer): Promise<string> {
    switch (kind) {
      case 'pdf': {
        // Loaded lazily, the PDF engine is heavy and only needed for PDF uploads
        const { PDFParse } = await import('pdf-parse')
        const parser = new PDFParse({ data: buffer })
        try {
          const data = await parser.getText()
          return data.text
        } finally {
          await parser.destroy()
        }
      }
      case 'docx': {
        const result = await mammoth.extractRawText({ buffer })
        return result.value
      }
      case 'text':
        return buffer.toString('utf8')
    }
  }

  /**
   * Normalize text deterministically
   * - Replace multiple whitespace with single space
   * - Trim lines
   * - Remove blank lines
   */
  normalizeText(text: string): string {
    return text
      .split(/\r?\n/)
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .filter((line) => line.length > 0)
      .join('\n')
  }
}
