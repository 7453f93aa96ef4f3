/**
 * HuggingFaceEmotionModel - hosted inference for the distilroberta emotion model
 *
 * The hosted model emits the six native labels plus `neutral`; neutral mass
 * is dropped and the classifier renormalizes what remains.
 */

import { z } from 'zod';
import { NATIVE_EMOTIONS, NativeEmotion, NativeEmotionModel, NativeScores } from '../types';
import { ClassificationError, ClassificationUnavailable, errorMessage } from '../../utils/errors';
import { TimeoutError, withTimeout } from '../../utils/timeout';
import { bearerHeaders, parseJsonBody } from '../../utils/http';

const labelScoreSchema = z.object({
  label: z.string(),
  score: z.number().min(0),
});

// The endpoint nests results per input; a single input may come back flat
const responseSchema = z.array(z.union([z.array(labelScoreSchema), labelScoreSchema])).min(1);

export interface HuggingFaceModelOptions {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const isNativeEmotion = (label: string): label is NativeEmotion => {
  return NATIVE_EMOTIONS.some((native) => native === label);
};

export class HuggingFaceEmotionModel implements NativeEmotionModel {
  readonly name = 'huggingface';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HuggingFaceModelOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isAvailable(): boolean {
    return this.options.apiKey !== null;
  }

  async predict(text: string): Promise<NativeScores> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new ClassificationUnavailable('HF_API_KEY not configured');
    }

    let response: Response;
    try {
      response = await withTimeout(
        (signal) => this.fetchImpl(`${this.options.baseUrl}/${this.options.model}`, {
          method: 'POST',
          headers: bearerHeaders(apiKey),
          body: JSON.stringify({ inputs: text }),
          signal,
        }),
        this.options.timeoutMs
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new ClassificationError(error.message, { timeoutMs: error.timeoutMs });
      }
      throw new ClassificationUnavailable(`Classifier endpoint unreachable: ${errorMessage(error)}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new ClassificationUnavailable(`Classifier rejected credential (${response.status})`);
    }
    if (response.status === 503) {
      throw new ClassificationUnavailable('Classifier model is still loading');
    }
    if (!response.ok) {
      throw new ClassificationError(`Classifier API error: ${response.status} ${response.statusText}`);
    }

    const parsed = await parseJsonBody(response, responseSchema);
    if (!parsed.ok) {
      throw new ClassificationError(`Malformed classifier response: ${parsed.issue}`);
    }

    const entries = parsed.data.flatMap((item) => (Array.isArray(item) ? item : [item]));

    const scores: NativeScores = { joy: 0, sadness: 0, anger: 0, fear: 0, surprise: 0, disgust: 0 };
    for (const { label, score } of entries) {
      const normalized = label.toLowerCase();
      if (isNativeEmotion(normalized)) {
        scores[normalized] = score;
      }
    }
    return scores;
  }
}
