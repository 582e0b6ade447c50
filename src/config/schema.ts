/**
 * Configuration Schema
 *
 * Defines the shape of ~/.grantkb/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Service providers reachable through the openai SDK.
 * Ollama is used through its OpenAI-compatible /v1 endpoint.
 */
export const ProviderTypeSchema = z.enum(['openai', 'ollama']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

/**
 * Embedding service, batching and retry policy
 */
export const EmbeddingConfigSchema = z.object({
  provider: ProviderTypeSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .min(1)
    .max(8192)
    .describe('Vector length the model produces; recorded per project'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Texts per embedding request'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout per embedding request'),
  max_attempts: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Attempts per batch before giving up on transient failures'),
  base_delay_ms: z.number().int().min(0).max(60000).describe('First retry delay'),
  max_delay_ms: z.number().int().min(0).max(300000).describe('Cap on any retry delay'),
});

/**
 * Answer generation (the ask command)
 */
export const GenerationConfigSchema = z.object({
  provider: ProviderTypeSchema,
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
});

/**
 * Chunk sizes are in characters
 */
export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(1).describe('Maximum characters per chunk'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .describe('Characters repeated from the previous chunk; must be below chunk_size'),
});

export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of results to return'),
});

export const IngestionConfigSchema = z.object({
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(32)
    .describe('Documents processed at once'),
  fingerprint: z
    .enum(['content-hash', 'mtime-size'])
    .describe('How changed documents are detected'),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to skip during ingestion'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  projects_dir: z
    .string()
    .min(1)
    .describe('Directory whose sub-folders are projects; relative paths resolve against ~/.grantkb'),
  embedding: EmbeddingConfigSchema,
  generation: GenerationConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  ingestion: IngestionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Every field optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

/**
 * Cross-field rules that only make sense once defaults are merged in
 */
export const ValidatedConfigSchema = ConfigSchema.superRefine((config, ctx) => {
  if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chunking', 'chunk_overlap'],
      message: `must be smaller than chunk_size (${config.chunking.chunk_size})`,
    });
  }
  if (config.embedding.max_delay_ms < config.embedding.base_delay_ms) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['embedding', 'max_delay_ms'],
      message: 'must not be smaller than base_delay_ms',
    });
  }
});
