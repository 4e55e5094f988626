/**
 * Quiz Artifact Store
 *
 * Reads and writes the canonical `mcqs.json` artifact: UTF-8, 2-space
 * indented JSON, overwritten on every write.
 */

import { readFile, writeFile } from 'node:fs/promises';

import { QuizPayloadError, QuizPayloadErrorCode } from './types.js';

export const ARTIFACT_FILENAME = 'mcqs.json';

export interface QuizArtifactStore {
  write(path: string, document: unknown): Promise<void>;
  read(path: string): Promise<unknown>;
}

export class FileArtifactStore implements QuizArtifactStore {
  /**
   * @throws {QuizPayloadError} ARTIFACT_WRITE_FAILED when the file cannot be written
   */
  async write(path: string, document: unknown): Promise<void> {
    try {
      await writeFile(path, JSON.stringify(document, null, 2), 'utf-8');
    } catch (error) {
      throw new QuizPayloadError(
        `Failed to write quiz artifact: ${path}`,
        QuizPayloadErrorCode.ARTIFACT_WRITE_FAILED,
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }

  async read(path: string): Promise<unknown> {
    const content = await readFile(path, 'utf-8');
    const value: unknown = JSON.parse(content);
    return value;
  }
}
