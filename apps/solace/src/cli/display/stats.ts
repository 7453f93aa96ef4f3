/**
 * Solace CLI - Session Statistics Display
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { CANONICAL_EMOTIONS, EmotionLabel, NEUTRAL_LABEL } from '../../emotion/types';
import { SessionStats } from '../../orchestrator/types';
import { emotionEmoji } from './emotion';

const LABELS: readonly EmotionLabel[] = [...CANONICAL_EMOTIONS, NEUTRAL_LABEL];

/**
 * Rows of the emotion table: labels seen at least once, most frequent first
 */
export function statsRows(stats: SessionStats): Array<[string, string, string]> {
  return LABELS
    .filter((label) => stats.emotionCounts[label] > 0)
    .sort((a, b) => stats.emotionCounts[b] - stats.emotionCounts[a])
    .map((label) => {
      const count = stats.emotionCounts[label];
      const share = stats.totalTurns > 0 ? Math.round((count / stats.totalTurns) * 100) : 0;
      return [`${emotionEmoji(label)} ${label}`, String(count), `${share}%`];
    });
}

/**
 * Display session statistics as formatted table
 */
export function displayStats(stats: SessionStats): void {
  console.log(chalk.bold('\n  📊 Session statistics\n'));
  console.log(`   ${chalk.white('Messages:')} ${stats.messageCount}   ${chalk.white('Your turns:')} ${stats.totalTurns}`);

  if (stats.totalTurns === 0) {
    console.log(chalk.gray('\n   Nothing to show yet. Tell me how you are feeling.\n'));
    return;
  }

  const dominant = stats.dominantEmotion;
  if (dominant) {
    console.log(`   ${chalk.white('Most frequent:')} ${emotionEmoji(dominant)} ${chalk.bold(dominant)}\n`);
  }

  const table = new Table({
    head: [chalk.white.bold('Emotion'), chalk.white.bold('Turns'), chalk.white.bold('Share')],
    colWidths: [20, 8, 8],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of statsRows(stats)) {
    table.push(row);
  }

  console.log(table.toString());
}
