/**
 * CLI Query Command
 *
 * Fetch one observer table and write it to a file (or stdout).
 *
 * Exit codes: 0 success (including the disallowed-date placeholder),
 * 1 any failure, 2 ambiguous target with the candidate list on stdout.
 */

import { writeFileSync } from 'fs';
import pc from 'picocolors';
import { fetchObserverTable, type SessionConfig } from '../../interactive';
import { getConfig, type AppConfig } from '../../lib/config';
import {
  SessionErrorCode,
  createRequest,
  type ObserverTableResult,
} from '../../lib/types';
import { createReplayFactory, loadReplayScript } from '../../transport';

export interface QueryCommandOptions {
  /** JSON transcript to replay instead of connecting */
  replay?: string;
  verbose?: boolean;
  stepTimeout?: number;
  step?: string;
  quantities?: string;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_AMBIGUOUS = 2;

export function exitCodeFor(result: ObserverTableResult): number {
  if (result.ok) return EXIT_SUCCESS;
  return result.error.code === SessionErrorCode.AMBIGUOUS_MATCH ? EXIT_AMBIGUOUS : EXIT_FAILURE;
}

/**
 * Output file named after the target, whitespace removed
 */
export function defaultOutputPath(target: string, extension: string): string {
  return target.replace(/\s+/g, '') + extension;
}

export function buildSessionConfig(
  config: AppConfig,
  options: QueryCommandOptions,
  signal?: AbortSignal
): SessionConfig {
  return {
    host: config.host,
    port: config.port,
    stepTimeoutMs: options.stepTimeout ?? config.stepTimeoutMs,
    connectTimeoutMs: config.connectTimeoutMs,
    verbose: options.verbose ?? false,
    onChunk: options.verbose ? (chunk) => process.stderr.write(pc.dim(chunk)) : undefined,
    openChannel: options.replay ? createReplayFactory(loadReplayScript(options.replay)) : undefined,
    signal,
  };
}

/**
 * Run one query with the CLI's config and options
 */
export async function runQuery(
  startTime: string,
  target: string,
  options: QueryCommandOptions,
  signal?: AbortSignal
): Promise<ObserverTableResult> {
  const config = getConfig();
  const request = createRequest(target, startTime, {
    stepSize: options.step ?? config.stepSize,
    quantityCode: options.quantities ?? config.quantityCode,
  });
  return fetchObserverTable(request, buildSessionConfig(config, options, signal));
}

/**
 * Print the one-line diagnostic for a failed result (and the candidate
 * list for ambiguous targets). Returns the exit code.
 */
export function reportFailure(result: ObserverTableResult): number {
  if (result.ok) return EXIT_SUCCESS;

  const { error } = result;
  if (error.code === SessionErrorCode.AMBIGUOUS_MATCH && error.diagnostic !== undefined) {
    process.stdout.write(error.diagnostic + '\n');
  }
  console.error(pc.red(`Error: ${error.message}`));
  return exitCodeFor(result);
}

export async function queryCommand(
  startTime: string,
  target: string,
  output: string | undefined,
  options: QueryCommandOptions,
  signal?: AbortSignal
): Promise<number> {
  if (!startTime?.trim() || !target?.trim()) {
    console.error(pc.red('Error: start time and target are required'));
    console.error(pc.dim('Usage: horizons-echo query "<start time>" "<target>" [output]'));
    return EXIT_FAILURE;
  }

  const result = await runQuery(startTime, target, options, signal);
  if (!result.ok) {
    return reportFailure(result);
  }

  if (result.synthesized) {
    console.error(pc.yellow('Warning: start date disallowed by HORIZONS, wrote placeholder line'));
  }

  const path = output ?? defaultOutputPath(target, getConfig().outputExtension);
  if (path === '-') {
    process.stdout.write(result.text + '\n');
  } else {
    writeFileSync(path, result.text + '\n');
    console.log(pc.green(`Wrote ${path}`));
  }
  return EXIT_SUCCESS;
}
