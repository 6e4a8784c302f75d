/**
 * Batch pipeline behind the regwatch CLI
 *
 * full:        consolidate state files, detect changes, persist, export, summarize
 * consolidate: consolidate state files and write the master table
 * changes:     detect changes across configured snapshots, persist, export
 * summary:     summarize the stored change log
 */

import { RegistryError, wrapError } from '@regwatch/core';
import type { ILogger, ISnapshotLoader } from '@regwatch/core';
import {
  ChangeDetector,
  SnapshotProcessor,
  formatChangeSummary,
  formatProcessingResult,
  summarizeChanges,
} from '@regwatch/change-core';
import type {
  ChangeLogSummary,
  IChangeLogStore,
  ProcessingResult,
} from '@regwatch/change-core';
import {
  AutoSnapshotLoader,
  StateConsolidator,
  exportChangeLog,
  summarizeMasterTable,
  writeMasterTable,
} from '@regwatch/connector-file';
import type { ConsolidationResult, MasterTableSummary } from '@regwatch/connector-file';
import type { ConfigFile } from './config.js';

export const RUN_MODES = ['full', 'consolidate', 'changes', 'summary'] as const;
export type RunMode = (typeof RUN_MODES)[number];

export type RunOutcome = 'changes-detected' | 'no-changes' | 'failed';

export type PipelineStep = 'consolidation' | 'changes' | 'summary';

export interface StepOutcome {
  step: PipelineStep;
  ok: boolean;
  /** Error code of a failed step */
  code?: string;
}

export interface PipelineDeps {
  store: IChangeLogStore;
  logger: ILogger;
  /** Snapshot loader (default: by file extension with the configured policies) */
  loader?: ISnapshotLoader;
  /** Clock for export file names and the default consolidation date */
  now?: () => Date;
}

export interface PipelineResult {
  mode: RunMode;
  outcome: RunOutcome;
  /** Steps run for the mode, in order; a failed step does not stop later ones */
  steps: StepOutcome[];
  consolidation?: ConsolidationResult;
  masterTable?: MasterTableSummary;
  processing?: ProcessingResult;
  /** Events written to the change log this run */
  appended: number;
  /** Export files written this run */
  exports: string[];
  summary?: ChangeLogSummary;
  /** Plain-text report for stdout */
  report: string;
  /** First step failure */
  error?: RegistryError;
}

function formatMasterTable(result: ConsolidationResult, summary: MasterTableSummary): string {
  const lines = [
    `## Consolidation`,
    `States loaded: ${result.loadedStates.join(', ')}`,
    `Total companies: ${summary.totalCompanies}`,
    `Duplicates removed: ${result.duplicateCount}`,
  ];
  for (const skipped of result.skippedStates) {
    lines.push(`- skipped ${skipped.state} [${skipped.code}]: ${skipped.message}`);
  }
  return lines.join('\n');
}

export async function runPipeline(
  config: ConfigFile,
  mode: RunMode,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { store, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const result: PipelineResult = {
    mode,
    outcome: 'no-changes',
    steps: [],
    appended: 0,
    exports: [],
    report: '',
  };
  const sections: string[] = [];

  const runStep = async (step: PipelineStep, fn: () => Promise<void>): Promise<void> => {
    try {
      await fn();
      result.steps.push({ step, ok: true });
    } catch (error) {
      const wrapped = wrapError(error);
      logger.error(wrapped.toActionableMessage(), { code: wrapped.code, mode, step });
      result.steps.push({ step, ok: false, code: wrapped.code });
      result.error ??= wrapped;
      sections.push(`## Run failed: ${step}\n${wrapped.toActionableMessage()}`);
    }
  };

  if (mode === 'full' || mode === 'consolidate') {
    await runStep('consolidation', async () => {
      if (!config.consolidation) {
        throw new RegistryError({
          code: 'CONFIGURATION_ERROR',
          message: `Mode "${mode}" requires a consolidation section`,
          suggestion: 'Add consolidation.states to the config file.',
        });
      }

      const consolidation = await new StateConsolidator({
        states: config.consolidation.states,
        snapshotDate: config.consolidation.snapshotDate ?? now(),
        columns: config.processing.columns,
        logger,
      }).consolidate();
      result.consolidation = consolidation;
      result.masterTable = summarizeMasterTable(consolidation.snapshot);

      if (config.consolidation.outputPath) {
        await writeMasterTable(consolidation.snapshot, config.consolidation.outputPath);
        logger.info(`Master table written to ${config.consolidation.outputPath}`);
      }

      sections.push(formatMasterTable(consolidation, result.masterTable));
    });
  }

  if (mode === 'full' || mode === 'changes') {
    await runStep('changes', async () => {
      if (config.snapshots.length < 2) {
        logger.warn('Fewer than two snapshots configured; no comparisons will run', {
          snapshots: config.snapshots.length,
        });
      }

      const loader =
        deps.loader ??
        new AutoSnapshotLoader({
          duplicateIdentifiers: config.processing.duplicateIdentifiers,
          columns: config.processing.columns,
          encoding: config.processing.encoding,
        });

      const processing = await new SnapshotProcessor({
        loader,
        detector: new ChangeDetector({ trackFields: config.processing.trackFields }),
        skipUnreadableSnapshots: config.processing.skipUnreadableSnapshots,
        logger,
      }).process(config.snapshots);
      result.processing = processing;
      result.summary = summarizeChanges(processing.events);
      sections.push(formatProcessingResult(processing));

      const { appended } = await store.append(processing.events);
      result.appended = appended;
      logger.info(`Appended ${appended} events to the change log`);

      if (config.export) {
        for (const format of config.export.formats) {
          const filePath = await exportChangeLog(processing.events, {
            dir: config.export.dir,
            format,
            now: now(),
          });
          if (filePath) {
            result.exports.push(filePath);
            logger.info(`Change log exported to ${filePath}`, { format });
          }
        }
      }
    });
  }

  if (mode === 'summary') {
    await runStep('summary', async () => {
      result.summary = summarizeChanges(await store.readAll());
    });
  }

  if (result.summary) {
    sections.push(formatChangeSummary(result.summary));
  }

  if (result.steps.some((step) => !step.ok)) {
    result.outcome = 'failed';
  } else if (result.summary && result.summary.totalChanges > 0) {
    result.outcome = 'changes-detected';
  }

  result.report = sections.join('\n\n');
  return result;
}
