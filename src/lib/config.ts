/**
 * Configuration
 *
 * Defaults, overridden by <configDir>/config.json, overridden by the
 * environment. The result is frozen and cached per process.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_QUANTITY_CODE, DEFAULT_STEP_SIZE } from './types';

export interface AppConfig {
  /** HORIZONS telnet host */
  host: string;
  port: number;
  /** Window for each prompt wait, applied per phase */
  stepTimeoutMs: number;
  connectTimeoutMs: number;
  stepSize: string;
  quantityCode: string;
  /** SQLite file for tracked events */
  databasePath: string;
  /** Appended to the target name when no output path is given */
  outputExtension: string;
}

export const DEFAULT_HOST = 'horizons.jpl.nasa.gov';
export const DEFAULT_PORT = 6775;

const CONFIG_KEYS: (keyof AppConfig)[] = [
  'host',
  'port',
  'stepTimeoutMs',
  'connectTimeoutMs',
  'stepSize',
  'quantityCode',
  'databasePath',
  'outputExtension',
];

let cached: AppConfig | null = null;

/**
 * Directory holding config.json and the events database
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.HORIZONS_ECHO_HOME || join(homedir(), '.horizons-echo');
}

function defaults(configDir: string): AppConfig {
  return {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    stepTimeoutMs: 15000,
    connectTimeoutMs: 10000,
    stepSize: DEFAULT_STEP_SIZE,
    quantityCode: DEFAULT_QUANTITY_CODE,
    databasePath: join(configDir, 'events.db'),
    outputExtension: '.txt',
  };
}

function parsePositiveInt(key: string, value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got '${String(value)}'`);
  }
  return parsed;
}

function readConfigFile(path: string): Partial<Record<keyof AppConfig, unknown>> {
  if (!existsSync(path)) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Invalid config file ${path}: expected a JSON object`);
  }
  const overrides: Partial<Record<keyof AppConfig, unknown>> = {};
  for (const key of CONFIG_KEYS) {
    if (key in parsed) overrides[key] = Reflect.get(parsed, key);
  }
  return overrides;
}

function applyOverrides(
  base: AppConfig,
  overrides: Partial<Record<keyof AppConfig, unknown>>
): AppConfig {
  const next = { ...base };
  if (overrides.host !== undefined) next.host = String(overrides.host);
  if (overrides.port !== undefined) next.port = parsePositiveInt('port', overrides.port);
  if (overrides.stepTimeoutMs !== undefined) {
    next.stepTimeoutMs = parsePositiveInt('stepTimeoutMs', overrides.stepTimeoutMs);
  }
  if (overrides.connectTimeoutMs !== undefined) {
    next.connectTimeoutMs = parsePositiveInt('connectTimeoutMs', overrides.connectTimeoutMs);
  }
  if (overrides.stepSize !== undefined) next.stepSize = String(overrides.stepSize);
  if (overrides.quantityCode !== undefined) next.quantityCode = String(overrides.quantityCode);
  if (overrides.databasePath !== undefined) next.databasePath = String(overrides.databasePath);
  if (overrides.outputExtension !== undefined) {
    next.outputExtension = String(overrides.outputExtension);
  }
  return next;
}

/**
 * Build a config from explicit sources (no caching)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configDir = getConfigDir(env);
  const fromFile = readConfigFile(join(configDir, 'config.json'));

  const fromEnv: Partial<Record<keyof AppConfig, unknown>> = {
    host: env.HORIZONS_HOST,
    port: env.HORIZONS_PORT,
    stepTimeoutMs: env.HORIZONS_STEP_TIMEOUT_MS,
    connectTimeoutMs: env.HORIZONS_CONNECT_TIMEOUT_MS,
    databasePath: env.DATABASE_URL,
  };

  const merged = applyOverrides(applyOverrides(defaults(configDir), fromFile), fromEnv);
  return Object.freeze(merged);
}

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Reset the cached config (for testing)
 */
export function resetConfig(): void {
  cached = null;
}
