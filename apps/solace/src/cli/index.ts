#!/usr/bin/env node

/**
 * Solace CLI - Entry Point
 *
 * Interactive terminal chat.
 */

import dotenv from 'dotenv';

dotenv.config();

// Keep service logs out of the conversation unless asked for
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'warn';
}

import chalk from 'chalk';
import { ServiceContainer } from '../services/index';
import { getConfig } from '../utils/config';
import { ChatLoop } from './chat';

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  try {
    const services = new ServiceContainer(getConfig());
    await new ChatLoop(services).run();
    process.exit(0);
  } catch (error) {
    console.error(chalk.red('\n❌ Chat error:'), error instanceof Error ? error.message : error);
    console.error(chalk.gray('\nStack trace:'), error instanceof Error ? error.stack : '');
    process.exit(1);
  }
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\n👋 Chat interrupted. Take care!'));
  process.exit(0);
});

process.on('SIGTERM', () => {
  console.log(chalk.yellow('\n\n👋 Chat terminated. Goodbye!'));
  process.exit(0);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('\n❌ Unhandled Rejection:'), reason);
  process.exit(1);
});

void main();
