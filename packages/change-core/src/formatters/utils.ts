/**
 * Formatter Utilities
 *
 * Shared utility functions for report formatting.
 */

import type { CountMap } from '../types/index.js';

/**
 * Render a count map as a bullet list, truncated after `max` entries
 */
export function formatCountList(counts: CountMap, max = 10): string[] {
  const entries = Object.entries(counts);
  const lines = entries.slice(0, max).map(([key, count]) => `- ${key || '(none)'}: ${count}`);
  if (entries.length > max) {
    lines.push(`... and ${entries.length - max} more`);
  }
  return lines;
}
