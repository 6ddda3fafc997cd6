import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { error, formatError, setDebug, warn } from './utils/logger.js';

export interface Config {
  debug: boolean;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

const defaultConfig: Config = {
  debug: false,
};

export const CONFIG_PATH = path.join(os.homedir(), '.config', 'cursor-rings', 'config.json');

export const DEBUG_ENV_VAR = 'CURSOR_RINGS_DEBUG';

/**
 * Parse an on/off environment flag. Returns undefined for anything that is not
 * recognisably one or the other.
 */
export function isTruthyFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
    case '':
      return false;
    default:
      return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    error(`Could not read ${configPath}`, err);
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) return parsed;
    warn(`Ignoring ${configPath}: expected a JSON object`);
  } catch (err) {
    warn(`Ignoring malformed config ${configPath}: ${formatError(err)}`);
  }
  return null;
}

/**
 * Defaults, then the config file, then the environment. Invalid values are
 * skipped field by field.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const config = { ...defaultConfig };
  const env = options.env ?? process.env;

  const fileConfig = readConfigFile(options.configPath ?? CONFIG_PATH);
  if (fileConfig && typeof fileConfig.debug === 'boolean') {
    config.debug = fileConfig.debug;
  }

  const envDebug = isTruthyFlag(env[DEBUG_ENV_VAR]);
  if (envDebug !== undefined) {
    config.debug = envDebug;
  } else if (env[DEBUG_ENV_VAR] !== undefined) {
    warn(`Ignoring ${DEBUG_ENV_VAR}=${env[DEBUG_ENV_VAR]}: expected 1/0 or true/false`);
  }

  return config;
}

export function applyConfig(config: Config): void {
  setDebug(config.debug);
}
