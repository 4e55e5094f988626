/**
 * Pipeline Orchestrator
 *
 * Runs one PDF through extraction, generation, recovery and payload
 * building, then publishes the quiz and optionally shares it.
 *
 * @example
 * ```typescript
 * const config = loadAppConfig();
 * const orchestrator = new PipelineOrchestrator({
 *   config,
 *   completionClient: new CompletionClient({ apiKey: config.openai.apiKey }),
 *   createPublisher: async () => GoogleFormsPublisher.fromAuth(await resolveGoogleAuth(config.forms)),
 * });
 *
 * const result = await orchestrator.run({ pdfPath: './handbook.pdf', language: 'he' });
 * if (result.ok) {
 *   console.log(result.formEditUrl);
 * }
 * ```
 */

import { randomUUID } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';

import {
  type PipelineFailure,
  type PipelineInput,
  type PipelineResult,
  type PipelineWarning,
  PipelineError,
  PipelineErrorCode,
  PipelineStage,
  PipelineWarningCode,
} from './types.js';
import type { AppConfig } from '../config/index.js';
import {
  type CompleteOptions,
  type CompletionRequest,
  type CompletionText,
  LLMError,
} from '../llm/index.js';
import {
  type PageTaggedDocument,
  type PdfInput,
  type ExtractPageTaggedTextOptions,
  PdfExtractionError,
  extractPageTaggedText,
} from '../pdf/index.js';
import {
  type QuizArtifactStore,
  type QuizLanguage,
  ARTIFACT_FILENAME,
  FileArtifactStore,
  QuizPayloadBuilder,
  QuizPayloadError,
  buildQuizPrompt,
  clampNumQuestions,
  normalizeLanguage,
  recoverJsonObject,
} from '../quiz/index.js';
import { type FormsPublisher, type PublishedQuiz } from '../forms/index.js';
import { type Logger, createLogger } from '../logging/index.js';

export const RUN_DIR_PREFIX = 'quizrun_';
const DEFAULT_UPLOAD_NAME = 'upload.pdf';

export type PdfTextExtractor = (
  input: PdfInput,
  options?: ExtractPageTaggedTextOptions
) => Promise<PageTaggedDocument>;

/**
 * Dependencies required to create a PipelineOrchestrator
 */
export interface PipelineDependencies {
  config: AppConfig;
  completionClient: {
    complete(request: CompletionRequest, options?: CompleteOptions): Promise<CompletionText>;
  };
  /** Called once per run, after a payload exists; a rejection degrades the run */
  createPublisher: () => Promise<FormsPublisher>;
  store?: QuizArtifactStore | undefined;
  extract?: PdfTextExtractor | undefined;
  logger?: Logger | undefined;
}

type PdfSource =
  | { kind: 'path'; path: string; filename: string }
  | { kind: 'upload'; buffer: Buffer; filename: string };

interface NormalizedInput {
  numQuestions: number;
  language: QuizLanguage;
  model: string;
  shareWith: string | null;
}

/**
 * Keeps the last path segment and replaces anything unusual, so an upload
 * name cannot escape the run directory.
 */
export function safeFilename(filename: string | undefined): string {
  const base = basename(filename ?? '').replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return base.length > 0 ? base : DEFAULT_UPLOAD_NAME;
}

export class PipelineOrchestrator {
  private readonly config: AppConfig;
  private readonly completionClient: PipelineDependencies['completionClient'];
  private readonly createPublisher: () => Promise<FormsPublisher>;
  private readonly store: QuizArtifactStore;
  private readonly extract: PdfTextExtractor;
  private readonly logger: Logger;

  constructor(dependencies: PipelineDependencies) {
    this.config = dependencies.config;
    this.completionClient = dependencies.completionClient;
    this.createPublisher = dependencies.createPublisher;
    this.store = dependencies.store ?? new FileArtifactStore();
    this.extract = dependencies.extract ?? extractPageTaggedText;
    this.logger = dependencies.logger ?? createLogger('pipeline');
  }

  /**
   * Runs the whole pipeline. Never rejects: every failure comes back as
   * `{ ok: false, error: { code, stage, message } }`. A failed run removes
   * its run directory; a successful one keeps it for `artifactPath`.
   */
  async run(input: PipelineInput): Promise<PipelineResult> {
    const runId = randomUUID();
    const logger = this.logger.withContext({ runId });
    let runDir: string | undefined;
    let uploadedPath: string | undefined;
    let succeeded = false;

    try {
      const source = this.validateSource(input);
      const normalized = this.normalize(input);
      logger.info('Pipeline started', {
        pdfFilename: source.filename,
        numQuestions: normalized.numQuestions,
        language: normalized.language,
        model: normalized.model,
      });

      runDir = await mkdtemp(join(this.config.workDir, RUN_DIR_PREFIX));
      let pdfPath: string;
      if (source.kind === 'upload') {
        uploadedPath = join(runDir, source.filename);
        await writeFile(uploadedPath, source.buffer);
        pdfPath = uploadedPath;
      } else {
        pdfPath = source.path;
      }

      const result = await this.execute(runId, runDir, pdfPath, source.filename, normalized, logger);
      succeeded = true;
      return result;
    } catch (error) {
      const wrapped = this.wrapError(error, PipelineStage.INPUT);
      logger.error('Pipeline failed', error, { code: wrapped.code, stage: wrapped.stage });
      return this.failure(runId, wrapped);
    } finally {
      if (!succeeded && runDir !== undefined) {
        await this.removeQuietly(runDir, 'Failed to remove run directory', logger);
      } else if (uploadedPath !== undefined) {
        await this.removeQuietly(uploadedPath, 'Failed to remove uploaded PDF', logger);
      }
    }
  }

  private async execute(
    runId: string,
    runDir: string,
    pdfPath: string,
    pdfFilename: string,
    input: NormalizedInput,
    logger: Logger
  ): Promise<PipelineResult> {
    const warnings: PipelineWarning[] = [];

    const document = await this.stage(PipelineStage.EXTRACTION, () =>
      this.extract(pdfPath, { logger: logger.child('extraction') })
    );
    if (document.failedPages.length > 0) {
      warnings.push({
        code: PipelineWarningCode.PAGES_UNREADABLE,
        message: `Text could not be extracted from pages ${document.failedPages.join(', ')}`,
      });
    }

    const prompt = buildQuizPrompt(document.text, input.numQuestions, input.language);
    logger.child('prompt').debug('Prompt built', {
      systemChars: prompt.system.length,
      userChars: prompt.user.length,
    });

    const completion = await this.stage(PipelineStage.COMPLETION, () =>
      this.completionClient.complete({ model: input.model, messages: prompt.messages })
    );

    const recovered = recoverJsonObject(completion.text);
    if (recovered.ok) {
      logger.child('recovery').debug('Recovered JSON object', { strategy: recovered.strategy });
    } else {
      logger.child('recovery').warn('Model output is not a JSON object', {
        reason: recovered.value._exception,
      });
    }

    const artifactPath = join(runDir, ARTIFACT_FILENAME);
    await this.stage(PipelineStage.ARTIFACT, () => this.store.write(artifactPath, recovered.value));

    const builder = new QuizPayloadBuilder({
      store: this.store,
      logger: logger.child('payload'),
      minAcceptableQuestions: this.config.generation.minAcceptableQuestions,
    });
    const payload = await this.stage(PipelineStage.PAYLOAD, () =>
      builder.build(recovered.value, input.numQuestions, artifactPath)
    );
    warnings.push(...payload.warnings.map(({ code, message }) => ({ code, message })));

    const publishLogger = logger.child('publish');
    let publisher: FormsPublisher | undefined;
    let published: PublishedQuiz | undefined;
    try {
      publisher = await this.createPublisher();
      published = await publisher.createQuiz(
        { title: this.config.forms.title, documentTitle: this.config.forms.documentTitle },
        payload.requests
      );
      if (!published.quizModeEnabled) {
        warnings.push({
          code: PipelineWarningCode.QUIZ_MODE_FAILED,
          message: 'Quiz mode could not be enabled; answers are not graded',
        });
      }
      publishLogger.info('Form published', { formId: published.formId });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push({
        code: PipelineWarningCode.FORM_CREATION_FAILED,
        message: `Failed to create Google Form: ${message}`,
      });
      publishLogger.error('Form creation failed', error);
    }

    let shareSuccess = false;
    let shareError: string | null = null;
    const sharedWith = published !== undefined ? input.shareWith : null;
    if (publisher !== undefined && published !== undefined && sharedWith !== null) {
      try {
        await publisher.shareWithUser(published.formId, sharedWith, 'writer');
        shareSuccess = true;
      } catch (error) {
        shareError = error instanceof Error ? error.message : String(error);
        warnings.push({
          code: PipelineWarningCode.SHARE_FAILED,
          message: `Failed to share form with ${sharedWith}: ${shareError}`,
        });
        logger.child('share').warn('Sharing failed', { email: sharedWith, error: shareError });
      }
    }

    logger.info('Pipeline finished', {
      formId: published?.formId ?? null,
      questions: payload.summary.processed,
      warnings: warnings.length,
    });

    return {
      ok: true,
      runId,
      artifactPath,
      formId: published?.formId ?? null,
      formEditUrl: published?.formEditUrl ?? null,
      responderUrl: published?.responderUrl ?? null,
      pdfFilename,
      numQuestions: input.numQuestions,
      language: input.language,
      model: input.model,
      strategy: completion.strategy,
      summary: payload.summary,
      sharedWith,
      shareSuccess,
      shareError,
      warnings,
    };
  }

  /**
   * @throws {PipelineError} INVALID_INPUT before any external call
   */
  private validateSource(input: PipelineInput): PdfSource {
    if (input.pdfBuffer !== undefined) {
      if (input.filename !== undefined && input.filename.trim().length === 0) {
        throw new PipelineError('No file selected', PipelineErrorCode.INVALID_INPUT, PipelineStage.INPUT);
      }
      if (input.pdfBuffer.length === 0) {
        throw new PipelineError('Uploaded PDF is empty', PipelineErrorCode.INVALID_INPUT, PipelineStage.INPUT);
      }
      return { kind: 'upload', buffer: input.pdfBuffer, filename: safeFilename(input.filename) };
    }

    if (input.pdfPath !== undefined && input.pdfPath.trim().length > 0) {
      return { kind: 'path', path: input.pdfPath, filename: input.filename ?? basename(input.pdfPath) };
    }

    throw new PipelineError("Missing file 'pdf'", PipelineErrorCode.INVALID_INPUT, PipelineStage.INPUT);
  }

  private normalize(input: PipelineInput): NormalizedInput {
    const generation = this.config.generation;
    const model = input.model?.trim();
    const shareWith = input.shareWith?.trim() || this.config.forms.shareWith || null;

    return {
      numQuestions:
        input.numQuestions === undefined
          ? generation.numQuestions
          : clampNumQuestions(input.numQuestions, generation.numQuestions),
      language: input.language === undefined ? generation.language : normalizeLanguage(input.language),
      model: model ? model : generation.model,
      shareWith,
    };
  }

  private async stage<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, stage);
    }
  }

  /**
   * Map an error to a PipelineError with the stage it failed in
   */
  private wrapError(error: unknown, stage: PipelineStage): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    if (error instanceof PdfExtractionError) {
      return new PipelineError(
        `Failed to extract text from PDF: ${error.message}`,
        PipelineErrorCode.EXTRACTION_FAILED,
        stage,
        { cause: error }
      );
    }

    if (error instanceof LLMError) {
      return new PipelineError(
        `Failed to generate questions: ${error.message}`,
        PipelineErrorCode.GENERATION_FAILED,
        stage,
        { cause: error }
      );
    }

    if (error instanceof QuizPayloadError) {
      return new PipelineError(error.message, error.code, stage, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new PipelineError(message, PipelineErrorCode.INTERNAL_ERROR, stage, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  private failure(runId: string, error: PipelineError): PipelineFailure {
    return { ok: false, runId, error: error.toDetail() };
  }

  private async removeQuietly(path: string, message: string, logger: Logger): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      logger.warn(message, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
