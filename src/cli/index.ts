#!/usr/bin/env node
/**
 * trustflow Command-Line Interface
 *
 * Usage: trustflow <command> [options]
 */

import { commands } from './commands/index.js';
import { ExitCode } from './types.js';
import { isConfigError, isInvalidInputError, isScenarioError } from '../utils/errors.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log('trustflow: time-decayed trust flow ranking');
  console.log('');
  console.log('Usage: trustflow <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "trustflow <command> --help" for command-specific help.');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`trustflow ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "trustflow --help" for available commands.');
    process.exit(ExitCode.Usage);
  }

  if (args.includes('--help') || args.includes('-h')) {
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    if (isInvalidInputError(error) || isConfigError(error) || isScenarioError(error)) {
      console.error(`Error: ${error.message} [${error.code}]`);
      process.exit(ExitCode.Usage);
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(ExitCode.Failure);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(ExitCode.Failure);
});
