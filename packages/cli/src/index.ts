/**
 * @regwatch/cli
 *
 * Batch runner: consolidation, change detection, persistence and reporting
 */

export { runPipeline, RUN_MODES } from './pipeline.js';
export type {
  PipelineDeps,
  PipelineResult,
  PipelineStep,
  RunMode,
  RunOutcome,
  StepOutcome,
} from './pipeline.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs } from './args.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, StoreConfig } from './config.js';
export { Logger, createRunId, redactSecrets } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';
export { createChangeLogStore } from './store-factory.js';
