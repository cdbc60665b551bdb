/**
 * Embedding provider backed by an Ollama server's /api/embed endpoint.
 */

import { z } from 'zod';
import { EmbeddingError } from '../../errors/index.js';
import type { EmbeddingProvider } from './types.js';

const EmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaProviderOptions {
  model: string;
  host: string;
  dimensions?: number;
  fetch?: typeof fetch;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  readonly dimensions?: number;

  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaProviderOptions) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.endpoint = `${options.host.replace(/\/+$/, '')}/api/embed`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: texts }),
      });
    } catch (error) {
      throw new EmbeddingError(
        `Ollama is not reachable at ${this.endpoint}`,
        error,
        'Start the server (ollama serve) or set OLLAMA_HOST'
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new EmbeddingError(
        `Ollama API error: ${response.status} ${response.statusText}${body ? ` - ${body}` : ''}`,
        undefined,
        `Make sure the model is pulled: ollama pull ${this.model}`
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new EmbeddingError('Ollama returned a response that is not JSON', error);
    }

    const parsed = EmbedResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Invalid response from Ollama API: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`
      );
    }

    return parsed.data.embeddings;
  }
}
