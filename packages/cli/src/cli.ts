#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   regwatch --config ./config.json [--mode full|consolidate|changes|summary] [--verbose]
 */

import { parseCliArgs, USAGE } from './args.js';
import { loadConfig } from './config.js';
import { Logger, createRunId } from './logger.js';
import { runPipeline } from './pipeline.js';
import { createChangeLogStore } from './store-factory.js';

async function main(): Promise<void> {
  let logger = new Logger();
  const args = parseCliArgs(process.argv.slice(2));

  if (!args) {
    console.error(USAGE);
    console.error('');
    console.error('Example config.json:');
    console.error(
      JSON.stringify(
        {
          consolidation: {
            states: [{ state: 'maharashtra', filePath: './data/maharashtra.csv' }],
            outputPath: './consolidated.csv',
          },
          snapshots: ['./data/snapshot_day1.csv', './data/snapshot_day2.csv'],
          store: { type: 'ndjson', dir: './.change-log' },
          export: { dir: './exports', formats: ['csv'] },
        },
        null,
        2
      )
    );
    process.exitCode = 1;
    return;
  }

  try {
    const config = await loadConfig(args.configPath);
    logger = new Logger({
      level: args.verbose ? 'debug' : config.logging?.level,
      format: config.logging?.format,
    }).child({ runId: createRunId(), mode: args.mode });

    const store = await createChangeLogStore(config.store);
    try {
      const result = await runPipeline(config, args.mode, { store, logger });
      process.stdout.write(`${result.report}\n`);
      logger.info(`Run finished: ${result.outcome}`, { appended: result.appended });
      process.exitCode = result.outcome === 'failed' ? 1 : 0;
    } finally {
      await store.close();
    }
  } catch (error) {
    logger.error('Run failed', { error });
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
