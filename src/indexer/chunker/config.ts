/**
 * Chunker Configuration
 *
 * Sizes are in characters, not tokens.
 */

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Boundaries tried in order when text is too long: paragraph, line,
 * sentence, clause, word. A piece with none of them left is cut into
 * fixed windows.
 */
export const SEPARATORS = ['\n\n', '\n', '. ', '? ', '! ', '; ', ', ', ' '] as const;
