/**
 * PDF Processing Module
 *
 * Page-tagged text extraction over pdf.js with a pdf-parse fallback.
 */

export {
  PdfErrorCode,
  PdfErrorCodeSchema,
  ExtractionMethodSchema,
  PdfExtractionOptionsSchema,
  PdfExtractionError,
  isPdfExtractionError,
  classifyOpenFailure,
  formatPageBlock,
  tagPages,
  type ExtractionMethod,
  type PdfExtractionOptions,
  type PdfInput,
  type PageTaggedDocument,
  type PdfPagesResult,
  type PdfTextBackend,
} from './types.js';

export {
  PdfJsBackend,
  PdfParseBackend,
  loadPdfParse,
  renderPdfParsePage,
  extractPageTaggedText,
  PDF_PARSE_PAGE_SEPARATOR,
  type PdfParseFn,
  type PdfParseOptions,
  type PdfParsePage,
  type ExtractPageTaggedTextOptions,
} from './extractor.js';
