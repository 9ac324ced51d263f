import { CONFIG_KEYS, saveConfig, setConfigValue } from '../core/config-store.js';
import { logger } from '../utils/logger.js';
import { loadContext } from './context.js';

export async function configShowCommand(): Promise<void> {
  const { config, configPath } = await loadContext();
  logger.dim(configPath);
  for (const key of CONFIG_KEYS) {
    const value = key === 'apiKey' && config.apiKey ? '********' : JSON.stringify(config[key]);
    logger.info(`${key.padEnd(22)} ${value}`);
  }
}

export async function configSetCommand(key: string, value: string): Promise<void> {
  const { config, configPath } = await loadContext();
  const next = setConfigValue(config, key, value);
  await saveConfig(next, configPath);
  logger.success(`${key} updated.`);
}
