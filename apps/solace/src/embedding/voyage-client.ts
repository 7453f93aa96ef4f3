/**
 * Voyage AI embeddings client
 */

import { z } from 'zod';
import { EmbeddingProvider, EmbeddingVector } from './types';
import { EmbeddingError, EmbeddingUnavailable, errorMessage } from '../utils/errors';
import { TimeoutError, withTimeout } from '../utils/timeout';
import { bearerHeaders, parseJsonBody } from '../utils/http';

const embeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()).min(1),
  })).min(1),
  model: z.string().optional(),
});

export interface VoyageClientOptions {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class VoyageEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'voyage';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: VoyageClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isAvailable(): boolean {
    return this.options.apiKey !== null;
  }

  async embed(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new EmbeddingUnavailable('VOYAGE_API_KEY not configured');
    }
    if (text.trim().length === 0) {
      throw new EmbeddingError('Cannot embed empty text');
    }

    let response: Response;
    try {
      response = await withTimeout(
        (timeoutSignal) => this.fetchImpl(`${this.options.baseUrl}/embeddings`, {
          method: 'POST',
          headers: bearerHeaders(apiKey),
          body: JSON.stringify({ input: [text], model: this.options.model }),
          signal: timeoutSignal,
        }),
        this.options.timeoutMs,
        signal
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new EmbeddingError(error.message, { timeoutMs: error.timeoutMs });
      }
      throw new EmbeddingError(`Voyage request failed: ${errorMessage(error)}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new EmbeddingUnavailable(`Voyage rejected credential (${response.status})`);
    }
    if (!response.ok) {
      throw new EmbeddingError(`Voyage API error: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    const parsed = await parseJsonBody(response, embeddingResponseSchema);
    if (!parsed.ok) {
      throw new EmbeddingError(`Malformed Voyage response: ${parsed.issue}`);
    }

    const values = parsed.data.data[0].embedding;
    return {
      values,
      dims: values.length,
      model: parsed.data.model ?? this.options.model,
    };
  }
}
