/**
 * Active Form Pointer
 *
 * A small JSON file naming the quiz that redirect links currently point at.
 * Writes go to a temp file in the same directory and are renamed over the
 * target, so readers never see a partial file; concurrent writers race and
 * the last rename wins.
 */

import { randomBytes } from 'node:crypto';
import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { z } from 'zod';

import { type Logger, createLogger } from '../logging/index.js';

export const ActiveFormPointerSchema = z.object({
  active_form_url: z.string().url(),
  active_responses_url: z.string().url(),
});

export type ActiveFormPointerData = z.infer<typeof ActiveFormPointerSchema>;

export type RedirectView = 'form' | 'responses';

/**
 * Responses tab of a form, derived from its edit or view URL.
 */
export function deriveResponsesUrl(formUrl: string): string {
  const base = (formUrl.split(/[?#]/)[0] ?? formUrl).replace(/\/+$/, '');
  const editUrl = /\/(viewform|edit)$/.test(base)
    ? base.replace(/\/(viewform|edit)$/, '/edit')
    : `${base}/edit`;
  return `${editUrl}#responses`;
}

export class ActiveFormPointer {
  private readonly logger: Logger;

  constructor(
    private readonly path: string,
    options: { logger?: Logger | undefined } = {}
  ) {
    this.logger = options.logger ?? createLogger('pointer');
  }

  /**
   * Returns null when the file is missing or does not hold a valid pointer.
   */
  async read(): Promise<ActiveFormPointerData | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch {
      return null;
    }

    try {
      const parsed = ActiveFormPointerSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      this.logger.warn('Active form pointer is not valid JSON', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    this.logger.warn('Active form pointer has an unexpected shape', { path: this.path });
    return null;
  }

  async write(pointer: ActiveFormPointerData): Promise<void> {
    const data = ActiveFormPointerSchema.parse(pointer);
    const tempPath = `${this.path}.${randomBytes(6).toString('hex')}.tmp`;

    try {
      await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    this.logger.info('Active form updated', { url: data.active_form_url });
  }

  /**
   * URL to redirect to for the given view, or null when no pointer is set.
   */
  async resolveRedirect(view: RedirectView = 'form'): Promise<string | null> {
    const pointer = await this.read();
    if (pointer === null) {
      return null;
    }
    return view === 'responses' ? pointer.active_responses_url : pointer.active_form_url;
  }
}
