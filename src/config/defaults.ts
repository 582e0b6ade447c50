/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  projects_dir: 'projects',

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small', // 1536 dimensions
    dimensions: 1536,
    batch_size: 64,
    timeout_ms: 60000,
    max_attempts: 3,
    base_delay_ms: 500,
    max_delay_ms: 8000,
  },

  generation: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0.3,
  },

  chunking: {
    chunk_size: 1000,
    chunk_overlap: 200,
  },

  search: {
    top_k: 5,
  },

  ingestion: {
    concurrency: 4,
    fingerprint: 'content-hash',
    ignore_patterns: [],
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.grantkb/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# grant-kb configuration
# Location: ~/.grantkb/config.toml (or $GRANTKB_HOME/config.toml)

# Each sub-folder of this directory is a project.
# Relative paths resolve against the grantkb directory.
projects_dir = "${DEFAULT_CONFIG.projects_dir}"

# Embedding Settings
# Changing model or dimensions requires: grantkb ingest --force
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
max_attempts = ${DEFAULT_CONFIG.embedding.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.embedding.base_delay_ms}
max_delay_ms = ${DEFAULT_CONFIG.embedding.max_delay_ms}

# Answer generation (grantkb ask)
[generation]
provider = "${DEFAULT_CONFIG.generation.provider}"
model = "${DEFAULT_CONFIG.generation.model}"
temperature = ${DEFAULT_CONFIG.generation.temperature}

# Chunking (in characters)
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}

# Ingestion
# fingerprint = "mtime-size" skips hashing, at the cost of missing edits
# that keep size and modification time
[ingestion]
concurrency = ${DEFAULT_CONFIG.ingestion.concurrency}
fingerprint = "${DEFAULT_CONFIG.ingestion.fingerprint}"
# ignore_patterns = ["drafts/", "*.bak"]
`;
