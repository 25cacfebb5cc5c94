import dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { writeFileAtomic } from './utils/files.js';
import { formatError, wrapError } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import {
  CONFIG_DIR_NAME,
  CONFIG_FILENAME,
  DEFAULT_BORDER,
  DEFAULT_BOX_SIZE,
  DEFAULT_CAPACITY_THRESHOLD,
  DEFAULT_CHUNK_DIR,
  DEFAULT_ERROR_CORRECTION,
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_PARALLEL_THRESHOLD,
  DEFAULT_PASSWORD_ATTEMPTS,
  DEFAULT_SAFETY_MARGIN,
  ERROR_CORRECTION_LEVELS,
  MAX_POOL_SIZE,
  SAMPLE_CONFIG_FILENAME,
} from './utils/constants.js';

// Load environment variables from .env file (if it exists)
dotenv.config();

/**
 * Settings file schema. Unknown keys are dropped, missing keys take defaults.
 */
export const ConfigSchema = z.object({
  chunking: z
    .object({
      maxPayloadBytes: z.number().int().min(1).default(DEFAULT_MAX_PAYLOAD_BYTES),
      safetyMargin: z.number().gt(0).max(1).default(DEFAULT_SAFETY_MARGIN),
      capacityThreshold: z.number().int().min(1).default(DEFAULT_CAPACITY_THRESHOLD),
    })
    .default({}),
  encoding: z
    .object({
      parallelThreshold: z.number().int().min(0).default(DEFAULT_PARALLEL_THRESHOLD),
      maxWorkers: z.number().int().min(1).max(64).default(MAX_POOL_SIZE),
    })
    .default({}),
  output: z
    .object({
      force: z.boolean().default(false),
      verbose: z.boolean().default(false),
      quiet: z.boolean().default(false),
    })
    .default({}),
  symbols: z
    .object({
      boxSize: z.number().int().min(1).default(DEFAULT_BOX_SIZE),
      border: z.number().int().min(0).default(DEFAULT_BORDER),
      errorCorrectionLevel: z.enum(ERROR_CORRECTION_LEVELS).default(DEFAULT_ERROR_CORRECTION),
    })
    .default({}),
  scanning: z
    .object({
      outputDir: z.string().min(1).default(`./${DEFAULT_CHUNK_DIR}`),
      autoReconstruct: z.boolean().default(false),
    })
    .default({}),
  security: z
    .object({
      passwordAttempts: z.number().int().min(1).max(10).default(DEFAULT_PASSWORD_ATTEMPTS),
    })
    .default({}),
});

export type TransferConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): TransferConfig {
  return ConfigSchema.parse({});
}

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Settings file; defaults to {@link getDefaultConfigPath} */
  path?: string;
  env?: Env;
  logger?: Logger;
}

/**
 * `$AIRGAP_CONFIG`, else `$XDG_CONFIG_HOME/airgap-transfer/config.json`
 * (with `~/.config` when XDG_CONFIG_HOME is unset)
 */
export function getDefaultConfigPath(env: Env = process.env): string {
  if (env.AIRGAP_CONFIG) return env.AIRGAP_CONFIG;
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, CONFIG_DIR_NAME, CONFIG_FILENAME);
}

/**
 * Reads and validates a settings file. A missing file means defaults; an
 * unreadable or invalid one is reported and also means defaults.
 */
export async function loadConfigFile(
  path: string,
  logger: Logger = createLogger('config')
): Promise<TransferConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      logger.warn(`Ignoring ${path}: ${formatError(error)}`);
    }
    return defaultConfig();
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring ${path}: not valid JSON (${formatError(error)})`);
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.warn(`Ignoring ${path}: ${issues}`);
    return defaultConfig();
  }
  return parsed.data;
}

function readEnvNumber(env: Env, key: string, logger: Logger): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    logger.warn(`Ignoring ${key}=${value}: not a number`);
    return undefined;
  }
  return parsed;
}

function readEnvBoolean(env: Env, key: string, logger: Logger): boolean | undefined {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (['true', '1', 'yes'].includes(value)) return true;
  if (['false', '0', 'no'].includes(value)) return false;
  logger.warn(`Ignoring ${key}=${value}: expected true or false`);
  return undefined;
}

function readEnvLevel(
  env: Env,
  key: string,
  logger: Logger
): (typeof ERROR_CORRECTION_LEVELS)[number] | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  const level = ERROR_CORRECTION_LEVELS.find((candidate) => candidate === value.toUpperCase());
  if (level === undefined) {
    logger.warn(`Ignoring ${key}=${value}: expected one of ${ERROR_CORRECTION_LEVELS.join(', ')}`);
  }
  return level;
}

function readEnvString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Layers `AIRGAP_*` variables over a loaded config. Overrides that fail
 * validation are reported and the file value is kept.
 */
export function applyEnvOverrides(
  config: TransferConfig,
  env: Env = process.env,
  logger: Logger = createLogger('config')
): TransferConfig {
  const merged: TransferConfig = {
    chunking: {
      maxPayloadBytes:
        readEnvNumber(env, 'AIRGAP_MAX_PAYLOAD_BYTES', logger) ?? config.chunking.maxPayloadBytes,
      safetyMargin:
        readEnvNumber(env, 'AIRGAP_SAFETY_MARGIN', logger) ?? config.chunking.safetyMargin,
      capacityThreshold:
        readEnvNumber(env, 'AIRGAP_CAPACITY_THRESHOLD', logger) ?? config.chunking.capacityThreshold,
    },
    encoding: {
      parallelThreshold:
        readEnvNumber(env, 'AIRGAP_PARALLEL_THRESHOLD', logger) ?? config.encoding.parallelThreshold,
      maxWorkers: readEnvNumber(env, 'AIRGAP_MAX_WORKERS', logger) ?? config.encoding.maxWorkers,
    },
    output: {
      force: readEnvBoolean(env, 'AIRGAP_FORCE', logger) ?? config.output.force,
      verbose: readEnvBoolean(env, 'AIRGAP_VERBOSE', logger) ?? config.output.verbose,
      quiet: readEnvBoolean(env, 'AIRGAP_QUIET', logger) ?? config.output.quiet,
    },
    symbols: {
      boxSize: readEnvNumber(env, 'AIRGAP_BOX_SIZE', logger) ?? config.symbols.boxSize,
      border: readEnvNumber(env, 'AIRGAP_BORDER', logger) ?? config.symbols.border,
      errorCorrectionLevel:
        readEnvLevel(env, 'AIRGAP_ERROR_CORRECTION', logger) ?? config.symbols.errorCorrectionLevel,
    },
    scanning: {
      outputDir: readEnvString(env, 'AIRGAP_SCAN_OUTPUT_DIR') ?? config.scanning.outputDir,
      autoReconstruct:
        readEnvBoolean(env, 'AIRGAP_AUTO_RECONSTRUCT', logger) ?? config.scanning.autoReconstruct,
    },
    security: {
      passwordAttempts:
        readEnvNumber(env, 'AIRGAP_PASSWORD_ATTEMPTS', logger) ?? config.security.passwordAttempts,
    },
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    logger.warn(`Ignoring environment overrides for ${keys}: invalid values`);
    return config;
  }
  return parsed.data;
}

/**
 * Defaults < settings file < environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TransferConfig> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger('config');
  const path = options.path ?? getDefaultConfigPath(env);
  const fromFile = await loadConfigFile(path, logger);
  return applyEnvOverrides(fromFile, env, logger);
}

export async function saveConfig(config: TransferConfig, path: string): Promise<void> {
  const text = JSON.stringify(ConfigSchema.parse(config), null, 2) + '\n';
  try {
    await writeFileAtomic(path, text);
  } catch (error) {
    throw wrapError(`Cannot write settings to ${path}`, error);
  }
}

/**
 * Overwrites the settings file with defaults
 */
export async function resetConfig(path: string): Promise<TransferConfig> {
  const defaults = defaultConfig();
  await saveConfig(defaults, path);
  return defaults;
}

/**
 * Writes a settings file holding every default, for editing
 *
 * @returns Path of the written sample
 */
export async function createSampleConfig(dir: string = process.cwd()): Promise<string> {
  const path = join(dir, SAMPLE_CONFIG_FILENAME);
  await saveConfig(defaultConfig(), path);
  return path;
}
