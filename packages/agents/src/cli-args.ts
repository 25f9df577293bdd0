// Argument parsing for the compintel CLI

import { ValidationError } from '../utils/errors.js';

export const CLI_COMMANDS = ['analyze', 'compare', 'session', 'sessions', 'menu', 'help'] as const;
export type CliCommand = typeof CLI_COMMANDS[number];

export interface CliArgs {
  command: CliCommand;
  /** Positional arguments after the command (company names or a session id). */
  positionals: string[];
  sessionId?: string;
  concurrency?: number;
  fetchPages: boolean;
  help: boolean;
}

function isCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some(c => c === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: 'help', positionals: [], fetchPages: true, help: false };
  if (argv.length === 0) return args;

  const [first, ...rest] = argv;
  if (first === '--help' || first === '-h') {
    args.help = true;
    return args;
  }
  if (!isCommand(first)) {
    throw new ValidationError(`Unknown command: ${first}`);
  }
  args.command = first;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--no-pages') {
      args.fetchPages = false;
    } else if (arg === '--session') {
      const value = rest[++i];
      if (!value) throw new ValidationError('--session needs a session id');
      args.sessionId = value;
    } else if (arg === '--concurrency') {
      const value = Number(rest[++i]);
      if (!Number.isInteger(value) || value < 1) {
        throw new ValidationError('--concurrency needs a positive integer');
      }
      args.concurrency = value;
    } else if (arg.startsWith('--')) {
      throw new ValidationError(`Unknown option: ${arg}`);
    } else {
      args.positionals.push(arg);
    }
  }

  return args;
}
