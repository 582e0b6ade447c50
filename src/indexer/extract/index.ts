export { ExtractorRegistry, createDefaultRegistry, withDocumentHeader } from './registry.js';
export { PlainTextExtractor } from './plain-text.js';
export { ExtrasSchema, type Extras, type ExtractedText, type TextExtractor } from './types.js';
