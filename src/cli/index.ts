#!/usr/bin/env node
/**
 * @fileoverview provenance-audit CLI
 *
 * Commands:
 *   provenance-audit analyze [options]  - Scan a repository and write a diagnostic report
 *   provenance-audit help [command]     - Show help
 *
 * stdout carries the run summary; logs and errors go to stderr.
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { analyzeCommand } from './commands/analyze.js';
import { createError, formatError, getExitCode } from './errors.js';
import { PROVENANCE_AUDIT_VERSION } from '../index.js';

type Command = 'analyze' | 'help';

const COMMANDS: ReadonlySet<string> = new Set<Command>(['analyze', 'help']);

function isCommand(value: string): value is Command {
  return COMMANDS.has(value);
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [first, ...rest] = argv;

  if (first === undefined || first === '-h' || first === '--help') {
    showHelp();
    return 0;
  }
  if (first === '-v' || first === '--version') {
    console.log(`provenance-audit ${PROVENANCE_AUDIT_VERSION.string}`);
    return 0;
  }

  try {
    if (!isCommand(first)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${first}`, {
        available: [...COMMANDS],
      });
    }

    if (first === 'help') {
      const { positionals } = parseArgs({ args: rest, allowPositionals: true, strict: false });
      showHelp(positionals[0]);
      return 0;
    }

    if (rest.includes('-h') || rest.includes('--help')) {
      showHelp(first);
      return 0;
    }
    await analyzeCommand({ args: rest });
    return 0;
  } catch (error) {
    console.error(formatError(error));
    return getExitCode(error);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatError(error));
    process.exitCode = getExitCode(error);
  },
);
