/**
 * Text extraction contracts
 *
 * Format-specific extraction (PDF, Word, Excel) sits behind this interface;
 * the pipeline only sees text plus a flat string map of extras.
 */

import { z } from 'zod';

/**
 * Format-specific metadata, e.g. `{ pages: "12" }` or `{ sheets: "Budget,Staff" }`.
 * Stored with the fingerprint and copied onto every chunk.
 */
export const ExtrasSchema = z.record(z.string());
export type Extras = z.infer<typeof ExtrasSchema>;

export interface ExtractedText {
  text: string;
  extras?: Extras;
}

export interface TextExtractor {
  /** Lower-case extensions without the dot */
  readonly extensions: readonly string[];
  extract(filePath: string): Promise<ExtractedText>;
}
