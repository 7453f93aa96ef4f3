/**
 * Solace CLI - Reply Display
 */

import chalk from 'chalk';
import { SourceTier, SourceTiers, SuggestionResult } from '../../suggestion/types';

const TIER_NAMES: Readonly<Record<SourceTier, string>> = {
  PRIMARY_API: 'Gemini',
  SECONDARY_API: 'Together AI',
  FALLBACK_RULE: 'offline templates',
};

export function describeSourceTier(tier: SourceTier): string {
  return TIER_NAMES[tier];
}

/**
 * Notice shown when the reply did not come from a chat API
 */
export function formatDegradedNotice(suggestion: SuggestionResult): string | null {
  if (suggestion.sourceTier !== SourceTiers.FALLBACK_RULE) return null;

  const failed = suggestion.attempts.filter((attempt) => attempt.outcome === 'failed').length;
  return failed > 0
    ? `⚠ Offline mode: ${failed} chat API${failed === 1 ? '' : 's'} failed, reply built from templates`
    : '⚠ Offline mode: no chat API configured, reply built from templates';
}

/**
 * Display the supportive reply
 */
export function displayReply(suggestion: SuggestionResult): void {
  console.log(chalk.gray('\n┌' + '─'.repeat(68) + '┐'));
  console.log(chalk.bold(`  💬 Solace ${chalk.gray(`via ${describeSourceTier(suggestion.sourceTier)}`)}\n`));

  for (const line of suggestion.text.split('\n')) {
    console.log(`   ${line}`);
  }

  const notice = formatDegradedNotice(suggestion);
  if (notice) {
    console.log(chalk.yellow(`\n   ${notice}`));
  }
  console.log(chalk.gray('└' + '─'.repeat(68) + '┘'));
}
