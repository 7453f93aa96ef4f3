/**
 * Solace CLI - Chat Loop
 *
 * Reads messages, runs each through one ChatSession and renders the emotion
 * and reply until the user exits.
 */

import chalk from 'chalk';
import ora from 'ora';
import { ChatSession } from '../orchestrator/chat-session';
import { ServiceContainer } from '../services/index';
import { errorMessage } from '../utils/errors';
import { displayEmotion } from './display/emotion';
import { displayReply } from './display/reply';
import { displayStats } from './display/stats';
import { displayGoodbye, displayWelcome } from './display/welcome';
import { confirmReset, displayHelp, parseCommand, promptMessage } from './prompts';

export class ChatLoop {
  private readonly session: ChatSession;

  constructor(private readonly services: ServiceContainer) {
    this.session = services.createSession('cli');
  }

  /**
   * Run until /exit
   */
  async run(): Promise<void> {
    console.clear();
    displayWelcome(this.services.capabilities());

    for (;;) {
      const command = parseCommand(await promptMessage());

      switch (command.kind) {
        case 'empty':
          break;
        case 'message':
          await this.handleMessage(command.text);
          break;
        case 'stats':
          displayStats(this.session.getStats());
          break;
        case 'reset':
          await this.handleReset();
          break;
        case 'help':
          displayHelp();
          break;
        case 'unknown':
          console.log(chalk.yellow(`Unknown command ${command.command}. Type /help for the list.`));
          break;
        case 'exit':
          displayStats(this.session.getStats());
          displayGoodbye();
          return;
      }
    }
  }

  private async handleMessage(text: string): Promise<void> {
    const spinner = ora('Listening...').start();
    try {
      const result = await this.session.processTurn(text);
      spinner.stop();
      displayEmotion(result.emotion);
      displayReply(result.suggestion);
    } catch (error) {
      spinner.fail(chalk.red(`Could not process that message: ${errorMessage(error)}`));
    }
  }

  private async handleReset(): Promise<void> {
    if (!(await confirmReset())) return;
    await this.session.resetSession();
    console.log(chalk.green('✓ Conversation cleared. What would you like to talk about?'));
  }
}
