/**
 * Loader selection by file extension
 */

import { extname } from 'node:path';
import { LoadError } from '@regwatch/core';
import type { ISnapshotLoader, Snapshot, SnapshotLoadOptions } from '@regwatch/core';
import { CsvSnapshotLoader, type CsvLoaderOptions } from './csv-snapshot-loader.js';
import { JsonSnapshotLoader, type JsonLoaderOptions } from './json-snapshot-loader.js';

export type SnapshotLoaderOptions = CsvLoaderOptions & JsonLoaderOptions;

/**
 * Create the loader matching a source's extension (.csv or .json)
 *
 * @throws LoadError UNSUPPORTED_FORMAT for any other extension
 */
export function createSnapshotLoader(
  source: string,
  options: SnapshotLoaderOptions = {}
): ISnapshotLoader {
  const extension = extname(source).toLowerCase();

  switch (extension) {
    case '.csv':
      return new CsvSnapshotLoader(options);
    case '.json':
      return new JsonSnapshotLoader(options);
    default:
      throw new LoadError({
        code: 'UNSUPPORTED_FORMAT',
        message: `Unsupported snapshot format: ${extension || '(no extension)'}`,
        source,
        suggestion: 'Provide snapshots as .csv or .json files.',
      });
  }
}

/**
 * Loader that dispatches each source by extension, for runs mixing formats
 */
export class AutoSnapshotLoader implements ISnapshotLoader {
  constructor(private readonly options: SnapshotLoaderOptions = {}) {}

  async load(source: string, loadOptions?: SnapshotLoadOptions): Promise<Snapshot> {
    return createSnapshotLoader(source, this.options).load(source, loadOptions);
  }
}
