/**
 * Solace CLI - Welcome Screen
 */

import chalk from 'chalk';
import { CapabilityReport } from '../../services/index';
import { SourceTiers } from '../../suggestion/types';
import { describeSourceTier } from './reply';

const status = (available: boolean): string => (available ? chalk.green('● on ') : chalk.gray('○ off'));

/**
 * Display welcome banner and which capabilities are configured
 */
export function displayWelcome(capabilities: CapabilityReport): void {
  console.log(`
${chalk.cyan('╔═══════════════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('║')}            ${chalk.magenta.bold('Solace')} ${chalk.gray('- a supportive listening companion')}             ${chalk.cyan('║')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════════════╝')}

${chalk.gray('Tell me how you are feeling. I will try to understand and suggest a few')}
${chalk.gray('gentle ideas. I am not a therapist; in an emergency, contact local services.')}
`);

  console.log(chalk.cyan.bold('Capabilities:'));
  console.log(`  ${status(capabilities.classifier.available)} emotion model (${capabilities.classifier.model})`);
  console.log(`  ${status(capabilities.embedding)} embeddings (Voyage AI)`);
  for (const tier of capabilities.suggestionTiers) {
    if (tier.tier === SourceTiers.FALLBACK_RULE) continue;
    console.log(`  ${status(tier.available)} replies via ${describeSourceTier(tier.tier)}`);
  }

  console.log(chalk.gray(`\nCommands: ${chalk.white('/stats')} statistics  ${chalk.white('/reset')} start over  ${chalk.white('/exit')} quit`));
  console.log(chalk.gray('─'.repeat(70)));
}

/**
 * Display goodbye message
 */
export function displayGoodbye(): void {
  console.log(chalk.magenta('\n💜 Take care of yourself. Goodbye!\n'));
}
