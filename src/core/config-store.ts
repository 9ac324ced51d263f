import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { ConfigurationError, errnoCode, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getConfigPath } from '../utils/paths.js';

const percent = z.number().int().min(1).max(100);

export const configSchema = z.object({
  apiKey: z.string().default(''),
  hotkey: z.string().min(1).default('ctrl+w'),
  headerWidthPercent: percent.default(10),
  headerHeightPercent: percent.default(10),
  transparencyPercent: percent.default(100),
  fontSize: z.number().int().min(8).max(200).default(40),
  currentIssueId: z.string().min(1).nullable().default(null),
  customTask: z.string().min(1).nullable().default(null),
  markdownOutputDir: z.string().min(1).default('.'),
  markdownAutoGenerate: z.boolean().default(true),
  syncOnEdit: z.boolean().default(true),
});

export const CONFIG_KEYS: readonly ConfigKey[] = configSchema.keyof().options;

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}

/**
 * Load configuration. A missing file gives the defaults; so does a broken one,
 * after logging why.
 */
export async function loadConfig(filePath: string = getConfigPath()): Promise<AppConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') {
      logger.warn(`Could not read config ${filePath}: ${getErrorMessage(err)}`);
    }
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    logger.error(`Failed to parse config ${filePath}: ${getErrorMessage(err)}`);
    return defaultConfig();
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error(`Invalid config ${filePath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    return defaultConfig();
  }
  return parsed.data;
}

export async function saveConfig(config: AppConfig, filePath: string = getConfigPath()): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  logger.debug(`Config saved to ${filePath}`);
}

/**
 * The API key to use: LINEAR_API_KEY wins over the stored one.
 */
export function resolveApiKey(config: AppConfig): string {
  return process.env.LINEAR_API_KEY || config.apiKey;
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(known => known === key);
}

/**
 * Apply a value typed on the command line. Booleans accept true/false/yes/no/1/0,
 * numbers must be integers, and "null" clears `currentIssueId` or `customTask`.
 */
export function setConfigValue(config: AppConfig, key: string, rawValue: string): AppConfig {
  if (!isConfigKey(key)) {
    throw new ConfigurationError(`Unknown config key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`);
  }

  const current = config[key];
  let value: unknown = rawValue;
  if (typeof current === 'boolean') {
    value = parseBoolean(rawValue);
  } else if (typeof current === 'number') {
    value = /^-?\d+$/.test(rawValue) ? Number(rawValue) : rawValue;
  } else if ((key === 'currentIssueId' || key === 'customTask') && rawValue === 'null') {
    value = null;
  }

  const parsed = configSchema.safeParse({ ...config, [key]: value });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid value for ${key}: ${issue?.message ?? 'rejected'}`, {
      context: { key, value: rawValue },
    });
  }
  return parsed.data;
}

function parseBoolean(raw: string): boolean | string {
  const normalized = raw.trim().toLowerCase();
  if (['true', 'yes', '1', 'on'].includes(normalized)) return true;
  if (['false', 'no', '0', 'off'].includes(normalized)) return false;
  return raw;
}
