/**
 * Base class for file-based snapshot loaders
 * Handles file access, error mapping and row-to-record mapping
 */

import { readFile } from 'node:fs/promises';
import { LoadError } from '@regwatch/core';
import type { ISnapshotLoader, Snapshot, SnapshotLoadOptions } from '@regwatch/core';
import { buildSnapshot, type RawRow, type RecordMappingOptions } from './record-mapper.js';

export interface FileLoaderOptions extends RecordMappingOptions {
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract base class for file loaders
 */
export abstract class BaseFileLoader<TOptions extends FileLoaderOptions>
  implements ISnapshotLoader
{
  readonly options: TOptions;

  constructor(options: TOptions) {
    this.options = options;
  }

  async load(source: string, loadOptions: SnapshotLoadOptions = {}): Promise<Snapshot> {
    const content = await this.readSource(source);

    let rows: RawRow[];
    try {
      rows = this.parseContent(content, source);
    } catch (error) {
      if (error instanceof LoadError) {
        throw error;
      }

      throw new LoadError({
        code: 'READ_FAILED',
        message: `Failed to parse ${source}: ${error instanceof Error ? error.message : String(error)}`,
        source,
        cause: error instanceof Error ? error : undefined,
      });
    }

    return buildSnapshot(rows, source, {
      ...this.options,
      snapshotDate: loadOptions.snapshotDate ?? this.options.snapshotDate,
    });
  }

  protected async readSource(source: string): Promise<string> {
    try {
      return await readFile(source, this.options.encoding ?? 'utf-8');
    } catch (error) {
      const code = errnoCode(error);

      if (code === 'ENOENT') {
        throw new LoadError({
          code: 'NOT_FOUND',
          message: `File not found: ${source}`,
          source,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new LoadError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${source}`,
          source,
          suggestion: 'Check file permissions.',
        });
      }

      throw new LoadError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        source,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Parse file content into raw rows (implemented by subclasses)
   */
  protected abstract parseContent(content: string, source: string): RawRow[];
}
