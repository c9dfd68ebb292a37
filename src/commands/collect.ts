/**
 * The `collect` command: one collection run, reported on stdout, with an
 * exit code cron can alert on.
 */

import { createCollectorDeps, requireConfig } from './context.js';
import { formatCollectionResult } from './format.js';
import { runCollection } from '../orchestrator/collector.js';
import type { CollectionResult } from '../orchestrator/types.js';
import type { PulseConfig } from '../config/types.js';
import { logger } from '../logging/logger.js';

export const EXIT_OK = 0;
/** No config, or the InfluxDB write failed. */
export const EXIT_FATAL = 1;
/** Some metrics failed; the rest were written. */
export const EXIT_PARTIAL = 2;

export function collectExitCode(result: CollectionResult): number {
  return result.failures.length > 0 ? EXIT_PARTIAL : EXIT_OK;
}

export async function runCollectCommand(options: { dryRun: boolean }): Promise<number> {
  let config: PulseConfig;
  try {
    config = requireConfig();
  } catch (error) {
    return fatal(error);
  }

  const deps = createCollectorDeps(config, { history: !options.dryRun });
  try {
    const result = await runCollection(deps, { dryRun: options.dryRun });
    console.log(formatCollectionResult(result));
    return collectExitCode(result);
  } catch (error) {
    return fatal(error);
  } finally {
    deps.history?.close();
  }
}

function fatal(error: unknown): number {
  const message = error instanceof Error ? error.message : 'Unknown error';
  logger.debug({ err: error }, 'Collection failed');
  console.error(`Error: ${message}`);
  return EXIT_FATAL;
}
