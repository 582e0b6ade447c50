import { readFile } from 'node:fs/promises';
import type { ExtractedText, TextExtractor } from './types.js';

/**
 * UTF-8 text and markdown, read as-is apart from a leading BOM.
 */
export class PlainTextExtractor implements TextExtractor {
  readonly extensions = ['txt', 'md'] as const;

  async extract(filePath: string): Promise<ExtractedText> {
    const content = await readFile(filePath, 'utf-8');
    return { text: content.replace(/^﻿/, '') };
  }
}
