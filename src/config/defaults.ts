/**
 * Default Configuration Values
 *
 * The loader layers ragdex.toml and environment overrides ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  paths: {
    docs_dir: 'docs',
    data_dir: 'data',
  },

  corpus: {
    extensions: ['txt'],
  },

  chunking: {
    chunk_size: 400,
    chunk_overlap: 50,
  },

  // Served by a local Ollama (ollama pull all-minilm)
  embedding: {
    provider: 'ollama',
    model: 'all-minilm', // 384 dimensions
    batch_size: 32,
  },

  search: {
    top_k: 5,
  },

  storage: {
    embeddings_filename: 'chunks_embeddings.f32',
    metadata_filename: 'chunks_meta.json',
    max_source_length: 128,
    max_text_length: 4000,
  },
};

/**
 * Config file template (TOML format)
 * Written by `ragdex config init`
 */
export const CONFIG_TEMPLATE = `# ragdex configuration
# Relative paths are resolved against the directory holding this file.
# Environment variables (RAG_TOP_K, CHUNK_SIZE, DOCS_DIR, ...) override these values.

[paths]
docs_dir = "${DEFAULT_CONFIG.paths.docs_dir}"
data_dir = "${DEFAULT_CONFIG.paths.data_dir}"

[corpus]
extensions = ["txt"]

# chunk_overlap must be smaller than chunk_size
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

# provider: "ollama" (set OLLAMA_HOST for a remote server)
# Changing the model requires re-running: ragdex ingest
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}

[storage]
embeddings_filename = "${DEFAULT_CONFIG.storage.embeddings_filename}"
metadata_filename = "${DEFAULT_CONFIG.storage.metadata_filename}"
max_source_length = ${DEFAULT_CONFIG.storage.max_source_length}
max_text_length = ${DEFAULT_CONFIG.storage.max_text_length}
`;
