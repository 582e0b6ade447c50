/**
 * Environment Variable Handler
 *
 * Loads service credentials and the grantkb home override.
 * Supports .env files for local development via dotenv.
 *
 * API keys are never logged or included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

/**
 * Keys are optional at load time; only the provider actually used needs one.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  GRANTKB_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 * Malformed URLs are dropped so the defaults apply.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: emptyToUndefined(process.env.OPENAI_API_KEY),
    OPENAI_BASE_URL: emptyToUndefined(process.env.OPENAI_BASE_URL),
    OLLAMA_HOST: emptyToUndefined(process.env.OLLAMA_HOST),
    GRANTKB_HOME: emptyToUndefined(process.env.GRANTKB_HOME),
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
  } else {
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    _envCache = EnvSchema.parse({
      OPENAI_API_KEY: raw.OPENAI_API_KEY,
      OPENAI_BASE_URL: invalid.has('OPENAI_BASE_URL') ? undefined : raw.OPENAI_BASE_URL,
      OLLAMA_HOST: invalid.has('OLLAMA_HOST') ? undefined : raw.OLLAMA_HOST,
      GRANTKB_HOME: raw.GRANTKB_HOME,
    });
  }

  return _envCache;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if the OpenAI key is configured without exposing it.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

/**
 * Shown when a required credential is missing.
 */
export const SETUP_INSTRUCTIONS = {
  openai: `
To use OpenAI models:

1. Create an API key at https://platform.openai.com/api-keys
2. Set it in your shell or in a .env file:

   export OPENAI_API_KEY="your-key"

3. (Optional) Point at a compatible gateway:

   export OPENAI_BASE_URL="https://gateway.example.com/v1"
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/ and run: ollama serve
2. Pull the models named in config.toml, e.g.:

   ollama pull nomic-embed-text

3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),
} as const;
