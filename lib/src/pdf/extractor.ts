/**
 * PDF Text Extraction
 *
 * Page-tagged text extraction. pdf.js reads the document page by page; if it
 * cannot open the file at all, pdf-parse is tried before giving up.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';

import {
  type PageTaggedDocument,
  type PdfExtractionOptions,
  type PdfInput,
  type PdfPagesResult,
  type PdfTextBackend,
  PdfErrorCode,
  PdfExtractionError,
  classifyOpenFailure,
  tagPages,
} from './types.js';
import { type Logger, createLogger } from '../logging/index.js';

// =============================================================================
// pdf.js Backend
// =============================================================================

export class PdfJsBackend implements PdfTextBackend {
  readonly method = 'pdfjs' as const;

  async extractPages(data: Buffer, options: PdfExtractionOptions): Promise<PdfPagesResult> {
    // Dynamic import of pdfjs-dist to avoid loading it if not needed
    const pdfjsLib = (await import('pdfjs-dist')).default;

    const loadingTask = pdfjsLib.getDocument({
      data: new Uint8Array(data),
      useWorkerFetch: false,
      isEvalSupported: false,
      useSystemFonts: true,
    });

    const pdfDocument = await loadingTask.promise;

    try {
      const pageCount = pdfDocument.numPages;
      const pagesToProcess = Math.min(options.maxPages ?? pageCount, pageCount);
      const pages: string[] = [];
      const failedPages: number[] = [];

      for (let pageNum = 1; pageNum <= pagesToProcess; pageNum++) {
        try {
          const page = await pdfDocument.getPage(pageNum);
          const textContent = await page.getTextContent();

          pages.push(
            textContent.items
              .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
              .join('')
              .trim()
          );
        } catch {
          pages.push('');
          failedPages.push(pageNum);
        }
      }

      return { pages, pageCount, failedPages };
    } finally {
      await pdfDocument.destroy();
    }
  }
}

// =============================================================================
// pdf-parse Backend
// =============================================================================

/**
 * The slice of a pdf-parse page object the renderer reads.
 */
export interface PdfParsePage {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: Array<{ str: string; transform: number[] }> }>;
}

export interface PdfParseOptions {
  max?: number;
  pagerender?: (page: PdfParsePage) => Promise<string>;
}

export type PdfParseFn = (
  data: Buffer,
  options?: PdfParseOptions
) => Promise<{ text: string; numpages: number }>;

/** Ends every rendered page so boundaries survive blank lines inside a page */
export const PDF_PARSE_PAGE_SEPARATOR = '\f';

const require = createRequire(import.meta.url);

/**
 * Loads pdf-parse through `require`: its entry point runs a debug self-test
 * when it has no parent module, which is the case under `import`.
 */
export function loadPdfParse(): PdfParseFn {
  const pdfParse: PdfParseFn = require('pdf-parse');
  return pdfParse;
}

/**
 * Same layout as pdf-parse's own renderer (a newline whenever the baseline
 * moves), followed by the page separator.
 */
export async function renderPdfParsePage(page: PdfParsePage): Promise<string> {
  const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
  let text = '';
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text + PDF_PARSE_PAGE_SEPARATOR;
}

/**
 * pdf-parse joins pages as `\n\n` + rendered page; the separator appended by
 * {@link renderPdfParsePage} marks where each one ends. Individual page
 * failures are not visible.
 */
export class PdfParseBackend implements PdfTextBackend {
  readonly method = 'pdf-parse' as const;

  constructor(private readonly load: () => PdfParseFn = loadPdfParse) {}

  async extractPages(data: Buffer, options: PdfExtractionOptions): Promise<PdfPagesResult> {
    const pdfParse = this.load();
    const parseOptions: PdfParseOptions = { pagerender: renderPdfParsePage };
    if (options.maxPages !== undefined) {
      parseOptions.max = options.maxPages;
    }
    const result = await pdfParse(data, parseOptions);
    const pages = result.text
      .split(PDF_PARSE_PAGE_SEPARATOR)
      .slice(0, -1)
      .map((page) => page.replace(/^\n\n/, '').trim());

    return { pages, pageCount: result.numpages, failedPages: [] };
  }
}

// =============================================================================
// Extraction
// =============================================================================

export interface ExtractPageTaggedTextOptions extends PdfExtractionOptions {
  /** Backends in the order they are tried; defaults to pdf.js then pdf-parse */
  backends?: PdfTextBackend[] | undefined;
  logger?: Logger | undefined;
}

async function readInput(input: PdfInput): Promise<{ buffer: Buffer; filePath?: string }> {
  if (typeof input !== 'string') {
    return { buffer: input };
  }

  if (!existsSync(input)) {
    throw new PdfExtractionError(`PDF not found: ${input}`, PdfErrorCode.FILE_NOT_FOUND, {
      filePath: input,
    });
  }

  try {
    return { buffer: await readFile(input), filePath: input };
  } catch (readError) {
    throw new PdfExtractionError(`Failed to read PDF file: ${input}`, PdfErrorCode.READ_ERROR, {
      filePath: input,
      cause: readError instanceof Error ? readError : undefined,
    });
  }
}

/**
 * Extracts the text of every page, each wrapped in
 * `===== PAGE n START =====` / `===== PAGE n END =====` delimiters.
 *
 * A page that fails to extract contributes an empty block and is listed in
 * `failedPages`.
 *
 * @throws {PdfExtractionError} FILE_NOT_FOUND, READ_ERROR, EMPTY_CONTENT,
 * INVALID_PDF, PASSWORD_PROTECTED or EXTRACTION_ERROR
 *
 * @example
 * ```typescript
 * const doc = await extractPageTaggedText('/tmp/quizrun_ab12/upload.pdf');
 * console.log(`${doc.pageCount} pages, ${doc.failedPages.length} unreadable`);
 * ```
 */
export async function extractPageTaggedText(
  input: PdfInput,
  options: ExtractPageTaggedTextOptions = {}
): Promise<PageTaggedDocument> {
  const startTime = performance.now();
  const logger = options.logger ?? createLogger('pdf');
  const backends = options.backends ?? [new PdfJsBackend(), new PdfParseBackend()];

  const { buffer, filePath } = await readInput(input);

  if (buffer.length === 0) {
    throw new PdfExtractionError('PDF buffer is empty', PdfErrorCode.EMPTY_CONTENT, { filePath });
  }

  // Check for PDF magic bytes (%PDF-)
  if (!buffer.subarray(0, 5).toString('ascii').startsWith('%PDF-')) {
    throw new PdfExtractionError(
      'Invalid PDF: file does not start with PDF header',
      PdfErrorCode.INVALID_PDF,
      { filePath }
    );
  }

  const failures: string[] = [];
  let lastError: Error | undefined;

  for (const backend of backends) {
    let result: PdfPagesResult;
    try {
      result = await backend.extractPages(buffer, { maxPages: options.maxPages });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      lastError = error instanceof Error ? error : undefined;
      failures.push(message);
      logger.warn('PDF backend could not open document', { method: backend.method, error: message });
      continue;
    }

    const text = tagPages(result.pages);

    for (const pageNumber of result.failedPages) {
      logger.warn('Failed to extract text from page', { page: pageNumber });
    }
    logger.info('Extraction complete', {
      method: backend.method,
      pages: result.pageCount,
      characters: text.length,
    });

    return {
      text,
      pageCount: result.pageCount,
      failedPages: result.failedPages,
      method: backend.method,
      charCount: text.length,
      durationMs: performance.now() - startTime,
    };
  }

  const code = failures.map(classifyOpenFailure).find((c) => c !== PdfErrorCode.EXTRACTION_ERROR);
  throw new PdfExtractionError(
    `PDF extraction failed: ${failures.join('; ') || 'no extraction backend available'}`,
    code ?? PdfErrorCode.EXTRACTION_ERROR,
    { filePath, cause: lastError }
  );
}
