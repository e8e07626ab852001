#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { cliLogger, setLogLevel } from '../lib/logger';
import { dueCommand, repliedCommand } from './commands/events';
import { queryCommand, type QueryCommandOptions } from './commands/query';
import { trackCommand, type TrackCommandOptions } from './commands/track';

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return parsed;
}

/**
 * Abort controller tied to Ctrl+C for the duration of one command
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  return controller.signal;
}

function withQueryOptions(command: Command): Command {
  return command
    .option('--replay <file>', 'replay a recorded JSON transcript instead of connecting')
    .option('--step-timeout <ms>', 'timeout for each prompt wait', parseTimeout)
    .option('--step <size>', 'output interval (default from config, 7d)')
    .option('--quantities <code>', 'table quantity code (default from config, 21)')
    .option('-v, --verbose', 'echo the dialogue to stderr and log each step');
}

const program = new Command();
program
  .name('horizons-echo')
  .description('Fetch observer tables from the JPL HORIZONS telnet service')
  .version('0.1.0')
  .hook('preAction', (_command, action) => {
    if (action.opts().verbose) setLogLevel('debug');
  });

withQueryOptions(
  program
    .command('query')
    .description('fetch the observer table for a target starting at a given time')
    .argument('<start-time>', 'start time, e.g. "2018-01-01 10:00"')
    .argument('<target>', 'target designator, passed verbatim (e.g. "2015 HM10;")')
    .argument('[output]', 'output file, "-" for stdout (default: target without spaces + extension)')
).action(
  async (startTime: string, target: string, output: string | undefined, options: QueryCommandOptions) => {
    process.exitCode = await queryCommand(startTime, target, output, options, interruptSignal());
  }
);

withQueryOptions(
  program
    .command('track')
    .description('query the light time for a mention and track its reply deadline')
    .argument('<text>', 'mention text naming the target')
    .requiredOption('--tweet-id <id>', 'id of the mention')
    .option('--at <time>', 'mention time, ISO-8601 (default: now)')
    .option('--handle <handle>', 'leading handle to strip from the mention')
).action(async (text: string, options: TrackCommandOptions) => {
  process.exitCode = await trackCommand(text, options, interruptSignal());
});

program
  .command('due')
  .description('list tracked events whose reply is due')
  .option('-a, --all', 'list every tracked event')
  .action((options: { all?: boolean }) => {
    process.exitCode = dueCommand(options);
  });

program
  .command('replied')
  .description('mark a tracked event as replied')
  .argument('<id>', 'event id')
  .action((id: string) => {
    process.exitCode = repliedCommand(id);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  cliLogger.error({ err: error }, 'command failed');
  process.exit(1);
});
