/**
 * JSON Snapshot Loader
 * Reads an array of row objects, or an object holding one under `records`
 */

import { LoadError } from '@regwatch/core';
import { BaseFileLoader, type FileLoaderOptions } from './base-file-loader.js';
import { assertSafeHeaders, type RawRow } from './record-mapper.js';

export interface JsonLoaderOptions extends FileLoaderOptions {
  /** Dot path to the records array (default: root array, else 'records') */
  recordsPath?: string;
}

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function parseSafePath(path: string, source: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new LoadError({
      code: 'READ_FAILED',
      message: `Invalid recordsPath: "${path}"`,
      source,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.records").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new LoadError({
        code: 'READ_FAILED',
        message: `Unsafe recordsPath segment: "${part}"`,
        source,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string, source: string): unknown {
  let current = obj;

  for (const part of parseSafePath(path, source)) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }

    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }

    current = Object.getOwnPropertyDescriptor(current, part)?.value;
  }

  return current;
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

export class JsonSnapshotLoader extends BaseFileLoader<JsonLoaderOptions> {
  constructor(options: JsonLoaderOptions = {}) {
    super(options);
  }

  protected parseContent(content: string, source: string): RawRow[] {
    const parsed: unknown = JSON.parse(stripBom(content));

    const items =
      Array.isArray(parsed) && !this.options.recordsPath
        ? parsed
        : getNestedValue(parsed, this.options.recordsPath ?? 'records', source);

    if (!Array.isArray(items)) {
      throw new LoadError({
        code: 'READ_FAILED',
        message: this.options.recordsPath
          ? `Path '${this.options.recordsPath}' does not contain an array`
          : 'JSON file has neither a root array nor a "records" array',
        source,
        suggestion: 'Provide an array of row objects, or set recordsPath.',
      });
    }

    return items.map((item: unknown, index) => {
      if (item === null || typeof item !== 'object' || Array.isArray(item)) {
        throw new LoadError({
          code: 'MALFORMED_RECORD',
          message: `Row ${index + 1}: expected an object`,
          source,
          context: { row: index + 1 },
        });
      }
      const row: RawRow = Object.fromEntries(Object.entries(item));
      assertSafeHeaders(Object.keys(row), source);
      return row;
    });
  }
}
