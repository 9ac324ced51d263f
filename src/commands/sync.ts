import { SyncRunner } from '../core/sync-runner.js';
import { logger } from '../utils/logger.js';
import type { ReconcileResult } from '../types/sync.js';
import { createClient, loadContext } from './context.js';

export async function syncCommand(
  file: string,
  options: { concurrency?: number; quiet?: boolean } = {},
): Promise<ReconcileResult> {
  const { config } = await loadContext();
  const runner = new SyncRunner({ client: createClient(config), concurrency: options.concurrency });

  const result = await runner.run(file);

  if (!options.quiet) {
    logger.info('--- Sync Results ---');
    logger.info(`Updated:   ${result.updated}`);
    logger.info(`Unchanged: ${result.unchanged}`);
    logger.info(`Skipped:   ${result.skipped}`);

    if (result.errors.length > 0) {
      logger.warn(`Errors:    ${result.errors.length}`);
      for (const err of result.errors) {
        logger.error(`  ${err.issueId}: ${err.error}`);
      }
    }
  }
  return result;
}
