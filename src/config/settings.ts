/**
 * Configuration Settings
 *
 * Sources, highest priority first:
 * - command line flags
 * - environment (a .env file in the working directory is loaded with dotenv)
 * - ./.xlf-translate.json, or ~/.xlf-translate/config.json, or the file given with --config
 * - defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import dotenv from 'dotenv';
import { ConfigurationError, errorMessage } from '../core/errors';
import { log } from '../util/log';

export type EngineName = 'openai' | 'deepl';

export const ENGINE_NAMES: readonly EngineName[] = ['openai', 'deepl'];

/**
 * Settings file structure, every key optional
 */
export interface ConfigFile {
  engine?: string;
  apiKey?: string;
  apiUrl?: string;
  model?: string;
  sourceLanguage?: string;
  batchSize?: number;
  batchMaxChars?: number;
  timeoutMs?: number;
  logFile?: string;
}

/**
 * Fully resolved settings for one run
 */
export interface Settings {
  engine: EngineName;
  apiKey: string;
  apiUrl: string;
  model: string;
  sourceLanguage?: string;
  batchSize: number;
  batchMaxChars: number;
  timeoutMs: number;
  logFile: string | null;
}

/**
 * Values given on the command line
 */
export interface SettingsOverrides {
  engine?: string;
  configPath?: string;
  batchSize?: number;
}

const DEFAULT_API_URLS: Record<EngineName, string> = {
  openai: 'https://api.openai.com/v1',
  deepl: 'https://api-free.deepl.com',
};

/** Engine specific fallbacks for the API key */
const ENGINE_KEY_VARIABLES: Record<EngineName, string> = {
  openai: 'OPENAI_API_KEY',
  deepl: 'DEEPL_API_KEY',
};

const DEFAULT_ENGINE: EngineName = 'openai';

const DEFAULT_SETTINGS = {
  model: 'gpt-4o-mini',
  batchSize: 40,
  batchMaxChars: 8000,
  timeoutMs: 60_000,
};

export const LOCAL_CONFIG_FILE = '.xlf-translate.json';
export const USER_CONFIG_PATH = path.join(os.homedir(), '.xlf-translate', 'config.json');

/** Empty variables count as unset */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function isEngineName(value: string): value is EngineName {
  return ENGINE_NAMES.some(name => name === value);
}

/**
 * Read a JSON config file
 *
 * @throws ConfigurationError if the file can't be read or holds values of the wrong type
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }

  const values = new Map(Object.entries(parsed));
  const text = (key: keyof ConfigFile): string | undefined => {
    const value = values.get(key);
    if (value === undefined || typeof value === 'string') return value;
    throw new ConfigurationError(`"${key}" in ${filePath} must be a string`);
  };
  const number = (key: keyof ConfigFile): number | undefined => {
    const value = values.get(key);
    if (value === undefined || typeof value === 'number') return value;
    throw new ConfigurationError(`"${key}" in ${filePath} must be a number`);
  };

  log(`[Config] Loaded ${filePath}`);
  return {
    engine: text('engine'),
    apiKey: text('apiKey'),
    apiUrl: text('apiUrl'),
    model: text('model'),
    sourceLanguage: text('sourceLanguage'),
    batchSize: number('batchSize'),
    batchMaxChars: number('batchMaxChars'),
    timeoutMs: number('timeoutMs'),
    logFile: text('logFile'),
  };
}

/**
 * Locate the config file to use, null when there is none
 */
export function findConfigFile(cwd: string, explicitPath?: string): string | null {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }

  const local = path.join(cwd, LOCAL_CONFIG_FILE);
  if (fs.existsSync(local)) {
    return local;
  }

  return fs.existsSync(USER_CONFIG_PATH) ? USER_CONFIG_PATH : null;
}

function positiveInteger(value: unknown, name: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const number = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(number) || number <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${String(value)}`);
  }
  return number;
}

/**
 * Resolve settings from overrides, environment and config file.
 *
 * @throws ConfigurationError for an unknown engine, a missing API key or invalid numbers
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Settings {
  const configPath = findConfigFile(cwd, overrides.configPath);
  const file: ConfigFile = configPath ? loadConfigFile(configPath) : {};

  const engineName = overrides.engine ?? envValue(env, 'XLF_TRANSLATE_ENGINE') ?? file.engine ?? DEFAULT_ENGINE;
  if (!isEngineName(engineName)) {
    throw new ConfigurationError(
      `Unknown translation engine "${engineName}". Available engines: ${ENGINE_NAMES.join(', ')}`
    );
  }

  const apiKey = envValue(env, 'XLF_TRANSLATE_API_KEY') ?? envValue(env, ENGINE_KEY_VARIABLES[engineName]) ?? file.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(
      `No API key for the ${engineName} engine. Set XLF_TRANSLATE_API_KEY or ${ENGINE_KEY_VARIABLES[engineName]}, ` +
      `or add "apiKey" to ${LOCAL_CONFIG_FILE}`
    );
  }

  const apiUrl = (envValue(env, 'XLF_TRANSLATE_API_URL') ?? file.apiUrl ?? DEFAULT_API_URLS[engineName]).replace(/\/+$/, '');

  return {
    engine: engineName,
    apiKey,
    apiUrl,
    model: envValue(env, 'XLF_TRANSLATE_MODEL') ?? file.model ?? DEFAULT_SETTINGS.model,
    sourceLanguage: envValue(env, 'XLF_TRANSLATE_SOURCE_LANGUAGE') ?? file.sourceLanguage,
    batchSize: overrides.batchSize
      ?? positiveInteger(envValue(env, 'XLF_TRANSLATE_BATCH_SIZE'), 'XLF_TRANSLATE_BATCH_SIZE')
      ?? positiveInteger(file.batchSize, 'batchSize')
      ?? DEFAULT_SETTINGS.batchSize,
    batchMaxChars: positiveInteger(file.batchMaxChars, 'batchMaxChars') ?? DEFAULT_SETTINGS.batchMaxChars,
    timeoutMs: positiveInteger(file.timeoutMs, 'timeoutMs') ?? DEFAULT_SETTINGS.timeoutMs,
    logFile: envValue(env, 'XLF_TRANSLATE_LOG_FILE') ?? file.logFile ?? null,
  };
}

/**
 * Load a .env file from the working directory into process.env
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  const result = dotenv.config({ path: path.join(cwd, '.env') });
  if (!result.error) {
    log('[Config] Loaded .env');
  }
}
