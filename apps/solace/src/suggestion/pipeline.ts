/**
 * SuggestionPipeline - ordered fallback over suggestion tiers
 *
 * Tiers are tried in order, each at most once, and the first success wins.
 * A tier whose capability is missing is skipped without being called. The
 * rule-based tier closes the chain and cannot fail; should it throw anyway,
 * a fixed reply is returned so the caller always gets text.
 */

import { AllTiersExhausted, SuggestionTierFailure, TurnAbortedError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  SourceTiers,
  SuggestionRequest,
  SuggestionResult,
  SuggestionTier,
  TierAttempt,
  TierOutcome,
} from './types';

const logger = createLogger('SuggestionPipeline');

export const SAFETY_NET_REPLY =
  "I'm here with you. Whatever you're facing, your feelings matter, and it's okay to take things one small step at a time. If you can, reach out to someone you trust and tell them how you're doing.";

export class SuggestionPipeline {
  private readonly tiers: readonly SuggestionTier[];

  constructor(tiers: readonly SuggestionTier[]) {
    if (tiers.length === 0) {
      throw new Error('SuggestionPipeline needs at least one tier');
    }
    this.tiers = [...tiers];
  }

  /**
   * Tier names in the order they are tried
   */
  get order(): string[] {
    return this.tiers.map((tier) => tier.tier);
  }

  /**
   * Produce one reply. Only a caller abort makes this reject.
   */
  async suggest(request: SuggestionRequest, signal?: AbortSignal): Promise<SuggestionResult> {
    const attempts: TierAttempt[] = [];

    for (const tier of this.tiers) {
      if (signal?.aborted) {
        throw new TurnAbortedError();
      }

      if (!tier.isAvailable()) {
        attempts.push({ tier: tier.tier, outcome: 'skipped', reason: 'unavailable', durationMs: 0 });
        logger.debug(`Skipping ${tier.tier}: capability not configured`);
        continue;
      }

      const startedAt = Date.now();
      const outcome = await this.runTier(tier, request, signal);
      const durationMs = Date.now() - startedAt;

      if (outcome.ok) {
        attempts.push({ tier: tier.tier, outcome: 'success', durationMs });
        logger.info('Reply generated', { tier: tier.tier, durationMs, attempts: attempts.length });
        return { text: outcome.text, sourceTier: tier.tier, attempts };
      }

      attempts.push({
        tier: tier.tier,
        outcome: 'failed',
        reason: outcome.failure.reason,
        message: outcome.failure.message,
        durationMs,
      });
      logger.warn(`${tier.tier} failed, falling back`, {
        reason: outcome.failure.reason,
        message: outcome.failure.message,
      });
    }

    if (signal?.aborted) {
      throw new TurnAbortedError();
    }

    const exhausted = new AllTiersExhausted('No suggestion tier produced a reply', { attempts });
    logger.error('All suggestion tiers exhausted, using safety-net reply', exhausted);
    return { text: SAFETY_NET_REPLY, sourceTier: SourceTiers.FALLBACK_RULE, attempts };
  }

  private async runTier(
    tier: SuggestionTier,
    request: SuggestionRequest,
    signal?: AbortSignal
  ): Promise<TierOutcome> {
    try {
      return await tier.attempt(request, signal);
    } catch (error) {
      const failure = error instanceof SuggestionTierFailure
        ? error
        : new SuggestionTierFailure(tier.tier, 'provider_error', errorMessage(error));
      return { ok: false, failure };
    }
  }
}
