/**
 * PDF Processing Types
 *
 * Page-tagged extraction result, backend contract and error codes.
 */

import { z } from 'zod';

// =============================================================================
// Error Codes (must be defined first for use in schemas)
// =============================================================================

/**
 * Error codes for PDF extraction failures
 */
export const PdfErrorCode = {
  /** File not found or path invalid */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** Invalid or corrupted PDF */
  INVALID_PDF: 'INVALID_PDF',
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  /** Zero-byte input */
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  /** Read error (permissions, etc.) */
  READ_ERROR: 'READ_ERROR',
  /** No backend could open the document */
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
} as const;

export type PdfErrorCode = (typeof PdfErrorCode)[keyof typeof PdfErrorCode];

export const PdfErrorCodeSchema = z.enum([
  'FILE_NOT_FOUND',
  'INVALID_PDF',
  'PASSWORD_PROTECTED',
  'EMPTY_CONTENT',
  'READ_ERROR',
  'EXTRACTION_ERROR',
]);

// =============================================================================
// Extraction Schemas
// =============================================================================

export const ExtractionMethodSchema = z.enum(['pdfjs', 'pdf-parse']);

export type ExtractionMethod = z.infer<typeof ExtractionMethodSchema>;

export const PdfExtractionOptionsSchema = z.object({
  /** Maximum number of pages to extract (undefined = all pages) */
  maxPages: z.number().int().positive().optional(),
});

export type PdfExtractionOptions = z.infer<typeof PdfExtractionOptionsSchema>;

/**
 * Input can be either a file path or a Buffer
 */
export type PdfInput = Buffer | string;

/**
 * Text of a whole document, one delimited block per page.
 */
export interface PageTaggedDocument {
  text: string;
  /** Pages in the document */
  pageCount: number;
  /** 1-based numbers of pages whose text could not be extracted */
  failedPages: number[];
  method: ExtractionMethod;
  charCount: number;
  durationMs: number;
}

/**
 * Per-page text from one backend. `pages[i]` is page `i + 1`.
 */
export interface PdfPagesResult {
  pages: string[];
  pageCount: number;
  failedPages: number[];
}

/**
 * A library that can open a PDF and return its page texts.
 *
 * `extractPages` rejects only when the document cannot be opened at all;
 * a single unreadable page is reported through `failedPages`.
 */
export interface PdfTextBackend {
  readonly method: ExtractionMethod;
  extractPages(data: Buffer, options: PdfExtractionOptions): Promise<PdfPagesResult>;
}

// =============================================================================
// Page Tagging
// =============================================================================

export function formatPageBlock(pageNumber: number, text: string): string {
  return `\n\n===== PAGE ${pageNumber} START =====\n${text}\n===== PAGE ${pageNumber} END =====`;
}

/**
 * Wraps each page in its delimiters, joins the blocks with a newline and
 * trims the result.
 */
export function tagPages(pages: readonly string[]): string {
  return pages
    .map((text, i) => formatPageBlock(i + 1, text))
    .join('\n')
    .trim();
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Custom error class for PDF extraction failures
 */
export class PdfExtractionError extends Error {
  readonly code: PdfErrorCode;
  readonly filePath: string | undefined;
  readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PdfErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'PdfExtractionError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PdfExtractionError);
    }
  }

  static fromError(error: unknown, code?: PdfErrorCode, filePath?: string): PdfExtractionError {
    if (error instanceof PdfExtractionError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new PdfExtractionError(message, code ?? PdfErrorCode.EXTRACTION_ERROR, {
      filePath,
      cause,
    });
  }
}

export function isPdfExtractionError(error: unknown): error is PdfExtractionError {
  return error instanceof PdfExtractionError;
}

/**
 * Maps a backend's open failure message to an error code.
 */
export function classifyOpenFailure(message: string): PdfErrorCode {
  const lower = message.toLowerCase();
  if (lower.includes('password') || lower.includes('encrypted')) {
    return PdfErrorCode.PASSWORD_PROTECTED;
  }
  if (lower.includes('invalid') || lower.includes('corrupt') || lower.includes('xref')) {
    return PdfErrorCode.INVALID_PDF;
  }
  return PdfErrorCode.EXTRACTION_ERROR;
}
