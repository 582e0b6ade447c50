/**
 * Chunker Module
 *
 * ```typescript
 * import { splitText } from './chunker/index.js';
 *
 * const chunks = splitText(documentText, config.chunking.chunk_size, config.chunking.chunk_overlap);
 * ```
 */

export { splitText, overlapTail, validateChunkSizes } from './chunker.js';
export { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP, SEPARATORS } from './config.js';
