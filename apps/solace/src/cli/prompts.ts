/**
 * Solace CLI - Inquirer Prompts
 */

import inquirer from 'inquirer';
import chalk from 'chalk';

export type ChatCommand =
  | { kind: 'message'; text: string }
  | { kind: 'reset' }
  | { kind: 'stats' }
  | { kind: 'help' }
  | { kind: 'exit' }
  | { kind: 'unknown'; command: string }
  | { kind: 'empty' };

const COMMANDS: Readonly<Record<string, ChatCommand>> = {
  '/reset': { kind: 'reset' },
  '/stats': { kind: 'stats' },
  '/help': { kind: 'help' },
  '/exit': { kind: 'exit' },
  '/quit': { kind: 'exit' },
};

/**
 * Classify one line of input as a slash command or a message
 */
export function parseCommand(input: string): ChatCommand {
  const trimmed = input.trim();
  if (!trimmed) return { kind: 'empty' };

  if (trimmed.startsWith('/')) {
    const command = trimmed.split(/\s+/)[0].toLowerCase();
    return COMMANDS[command] ?? { kind: 'unknown', command };
  }
  return { kind: 'message', text: input };
}

/**
 * Prompt for the next message
 */
export async function promptMessage(): Promise<string> {
  const { message } = await inquirer.prompt<{ message: string }>([
    {
      type: 'input',
      name: 'message',
      message: chalk.magenta('You:'),
      prefix: '',
    },
  ]);

  return message;
}

/**
 * Confirm before clearing the conversation
 */
export async function confirmReset(): Promise<boolean> {
  const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: chalk.cyan('Clear this conversation and start over?'),
      default: true,
    },
  ]);

  return confirmed;
}

export function displayHelp(): void {
  console.log(chalk.gray(`
  ${chalk.white('/stats')}  show emotions detected so far
  ${chalk.white('/reset')}  clear the conversation and start over
  ${chalk.white('/exit')}   leave the chat
`));
}
