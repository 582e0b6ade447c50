/**
 * Extractor Registry
 *
 * Maps extensions to extractors. Formats without a registered extractor
 * still reach the pipeline, which reports them as ExtractionError failures
 * rather than silently dropping them.
 *
 * @example
 * ```ts
 * const registry = createDefaultRegistry();
 * registry.register(myPdfExtractor);
 * const { text } = await registry.extract(document);
 * ```
 */

import { basename, dirname } from 'node:path';
import { ExtractionError } from '../../errors/index.js';
import type { DocumentInfo } from '../types.js';
import { PlainTextExtractor } from './plain-text.js';
import type { ExtractedText, TextExtractor } from './types.js';

export class ExtractorRegistry {
  private readonly byExtension = new Map<string, TextExtractor>();

  /**
   * Later registrations replace earlier ones for the same extension.
   */
  register(extractor: TextExtractor): this {
    for (const ext of extractor.extensions) {
      this.byExtension.set(ext.toLowerCase().replace(/^\./, ''), extractor);
    }
    return this;
  }

  supports(extension: string): boolean {
    return this.byExtension.has(extension.toLowerCase());
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }

  /**
   * @throws ExtractionError when no extractor is registered or it fails
   */
  async extract(document: DocumentInfo): Promise<ExtractedText> {
    const extractor = this.byExtension.get(document.extension);
    if (!extractor) {
      throw new ExtractionError(
        document.relativePath,
        `no extractor registered for .${document.extension}`
      );
    }

    try {
      return await extractor.extract(document.path);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(document.relativePath, reason, error);
    }
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry().register(new PlainTextExtractor());
}

/**
 * Prefix extracted text with the file name and its folder so chunks from
 * similarly worded documents stay distinguishable in retrieval and answers.
 * Blank text stays blank.
 */
export function withDocumentHeader(relativePath: string, projectName: string, text: string): string {
  if (text.trim() === '') {
    return '';
  }
  const folder = dirname(relativePath);
  const location = folder === '.' ? projectName : basename(folder);
  return `File: ${basename(relativePath)}\nLocation: ${location}\n\n${text}`;
}
