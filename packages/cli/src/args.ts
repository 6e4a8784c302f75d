import { RUN_MODES, type RunMode } from './pipeline.js';

export interface CliArgs {
  configPath: string;
  mode: RunMode;
  verbose: boolean;
}

export const USAGE = `Usage: regwatch --config <config.json> [--mode ${RUN_MODES.join('|')}] [--verbose]`;

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

/**
 * Parse argv (without the node and script entries); null means print usage
 */
export function parseCliArgs(args: readonly string[]): CliArgs | null {
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  if (!configPath || configPath.startsWith('--')) return null;

  const modeIndex = args.indexOf('--mode');
  let mode: RunMode = 'full';
  if (modeIndex !== -1) {
    const value = args[modeIndex + 1] ?? '';
    if (!isRunMode(value)) return null;
    mode = value;
  }

  return { configPath, mode, verbose: args.includes('--verbose') };
}
