#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleGenerateCommand, printGenerateHelp } from './cli/generate-command.js';
import { handleListCommand, printListHelp } from './cli/list-command.js';
import { handleUpdateCommand, printUpdateHelp } from './cli/update-command.js';
import { parseGlobalOptions } from './cli/global-options.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

const COMMANDS = new Set(['generate', 'list', 'update', 'help']);

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global help/version only count before any command
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  try {
    const globals = parseGlobalOptions(args, VERSION);

    // No command, or options only, means generate
    const first = args[0];
    let command = 'generate';
    if (first !== undefined && !first.startsWith('-')) {
      if (!COMMANDS.has(first)) {
        printHelp(`Unknown command '${first}'.`);
        process.exit(1);
        return;
      }
      command = first;
      args.shift();
    }

    const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
    const showHelp = helpFlags.has('--help') || helpFlags.has('-h');

    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'generate':
        if (showHelp) {
          printGenerateHelp();
        } else {
          await handleGenerateCommand(args, globals);
        }
        break;

      case 'list':
        if (showHelp) {
          printListHelp();
        } else {
          handleListCommand(args, globals);
        }
        break;

      case 'update':
        if (showHelp) {
          printUpdateHelp();
        } else {
          await handleUpdateCommand(args, globals);
        }
        break;

      default:
        printHelp(`Unknown command '${command}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
