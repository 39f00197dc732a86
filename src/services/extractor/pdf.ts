/**
 * PDF attachment text extraction.
 *
 * Anything that is not a PDF, or that fails to parse, yields ''.
 */

import { PDFParse } from 'pdf-parse';
import { errorMessage } from '../../utils/errors.js';
import { silentLogger, type AppLogger } from '../../utils/observability/index.js';
import type { DocumentExtractor } from '../intake/types.js';

const PDF_MAGIC = Buffer.from('%PDF-', 'ascii');

export function looksLikePdf(content: Buffer): boolean {
  return content.length >= PDF_MAGIC.length && content.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
}

export class PdfDocumentExtractor implements DocumentExtractor {
  private readonly logger: AppLogger;

  constructor(logger: AppLogger = silentLogger) {
    this.logger = logger.child({ component: 'pdf-extractor' });
  }

  async extract(content: Buffer): Promise<string> {
    if (!looksLikePdf(content)) return '';

    let parser: PDFParse | null = null;
    try {
      // Copied so the parser never detaches the caller's buffer.
      parser = new PDFParse({ data: new Uint8Array(content) });
      const result = await parser.getText();
      return result.text.trim();
    } catch (err) {
      this.logger.warn('pdf_extract_failed', { sizeBytes: content.length, error: errorMessage(err) });
      return '';
    } finally {
      await parser?.destroy().catch((err: unknown) => {
        this.logger.debug('pdf_parser_destroy_failed', { error: errorMessage(err) });
      });
    }
  }
}
