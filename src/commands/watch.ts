import { MarkdownWatcher } from '../core/file-watcher.js';
import { getMyIssuesPath, writeMyIssuesMarkdown } from '../core/markdown-renderer.js';
import { SyncRunner } from '../core/sync-runner.js';
import { DEFAULT_DEBOUNCE_MS, DEFAULT_ISSUE_LIMIT } from '../constants.js';
import type { AppConfig } from '../types/config.js';
import type { IssueRepository } from '../types/linear.js';
import { logger } from '../utils/logger.js';
import { createClient, loadContext } from './context.js';

/**
 * File to watch. An explicit path is used as is. Without one, the my-issues
 * file in `markdownOutputDir`, written fresh first when `markdownAutoGenerate`
 * is on.
 */
export async function resolveWatchTarget(
  config: AppConfig,
  client: Pick<IssueRepository, 'getMyIssues'>,
  file?: string,
): Promise<string> {
  if (file) return file;
  if (!config.markdownAutoGenerate) {
    return getMyIssuesPath(config.markdownOutputDir);
  }
  const issues = await client.getMyIssues(DEFAULT_ISSUE_LIMIT);
  const filePath = await writeMyIssuesMarkdown(config.markdownOutputDir, issues);
  logger.info(`Generated ${filePath} (${issues.length} issue(s))`);
  return filePath;
}

export async function watchCommand(file: string | undefined, options: { debounce?: number }): Promise<void> {
  const { config } = await loadContext();
  const debounceMs = options.debounce ?? DEFAULT_DEBOUNCE_MS;
  const client = createClient(config);
  const target = await resolveWatchTarget(config, client, file);
  const runner = new SyncRunner({ client });
  const watcher = new MarkdownWatcher({ runner, config, debounceMs });

  await watcher.watch(target);
  if (!watcher.isWatching) {
    return;
  }

  logger.info(`Debounce: ${debounceMs}ms`);
  logger.dim('Press Ctrl+C to stop.');

  const shutdown = async () => {
    logger.info('Shutting down watcher...');
    await watcher.unwatch();
    await runner.idle();
  };

  const onSignal = () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}
