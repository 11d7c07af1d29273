#!/usr/bin/env node

/**
 * PipeSpec CLI — Pipeline Specification Checks
 *
 * Usage:
 *   pipespec validate <file> [--strict]   Load and summarize a pipeline file
 *   pipespec refs <file>                  List step inputs, check references
 *
 * Environment:
 *   PIPESPEC_STRICT_REFS=1   Same as --strict
 *   PIPESPEC_VERBOSE=1       Log loader events to stderr
 */

import { getEventBus } from '../../shared/index.js';
import { validate } from './commands/validate.js';
import { refs } from './commands/refs.js';

const VERSION = '0.1.0';

const USAGE = `
PipeSpec — Pipeline Specification Checks

Usage:
  pipespec validate <file> [--strict]   Load and summarize a pipeline file
  pipespec refs <file>                  List step inputs and check references
  pipespec help                         Show this help message

Version: ${VERSION}
`;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args.at(0);
  const rest = args.slice(1);
  const flags = rest.filter(a => a.startsWith('--'));
  const file = rest.find(a => !a.startsWith('--'));

  const bus = getEventBus();
  if (process.env.PIPESPEC_VERBOSE === '1') {
    bus.on('spec.*', (event) => {
      console.error(`[pipespec] ${event.channel}`, JSON.stringify(event.payload));
    });
  }

  switch (command) {
    case 'validate': {
      if (!file) throw new Error('validate requires a <file> argument');
      const strict = flags.includes('--strict') || process.env.PIPESPEC_STRICT_REFS === '1';
      const result = validate(file, { strict, bus });
      console.log(result.report);
      if (!result.ok) process.exit(1);
      break;
    }

    case 'refs': {
      if (!file) throw new Error('refs requires a <file> argument');
      const result = refs(file, { bus });
      console.log(result.report);
      if (!result.ok) process.exit(1);
      break;
    }

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      console.log(USAGE);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(USAGE);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('PipeSpec error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
