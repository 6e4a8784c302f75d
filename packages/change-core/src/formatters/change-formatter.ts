/**
 * Change Report Formatter
 *
 * Formats change log summaries and processing runs as plain text.
 */

import { formatTimestamp } from '@regwatch/core';
import type { ChangeLogSummary, ProcessingResult } from '../types/index.js';
import { formatCountList } from './utils.js';

/**
 * Format a change log summary as plain text
 */
export function formatChangeSummary(summary: ChangeLogSummary): string {
  const lines: string[] = [];

  lines.push(`## Change Detection Summary`);
  if (summary.empty) {
    lines.push(`No changes detected.`);
    return lines.join('\n');
  }

  lines.push(`Total Changes: ${summary.totalChanges}`);
  lines.push(
    `Date Range: ${formatTimestamp(summary.dateRange.earliest)} to ${formatTimestamp(summary.dateRange.latest)}`
  );
  lines.push('');

  lines.push(`### Change Types`);
  lines.push(...formatCountList(summary.byChangeType));
  lines.push('');

  lines.push(`### Fields Changed`);
  lines.push(...formatCountList(summary.byFieldChanged));
  lines.push('');

  lines.push(`### States Affected`);
  lines.push(...formatCountList(summary.byState));

  return lines.join('\n');
}

/**
 * Format a multi-snapshot processing run as plain text
 */
export function formatProcessingResult(result: ProcessingResult): string {
  const lines: string[] = [];

  lines.push(`## Change Detection Run`);
  lines.push(`Snapshots loaded: ${result.loaded.length}`);
  lines.push(`Detection rounds: ${result.rounds}`);

  if (result.skipped.length > 0) {
    lines.push(`Snapshots skipped: ${result.skipped.length}`);
    for (const skipped of result.skipped) {
      lines.push(`- ${skipped.source} [${skipped.code}]: ${skipped.message}`);
    }
  }
  lines.push('');

  result.reports.forEach((report, index) => {
    const from = report.previousSource ?? '(previous)';
    const to = report.currentSource ?? '(current)';
    lines.push(`### Round ${index + 1}: ${from} -> ${to} (${formatTimestamp(report.changeDate)})`);
    if (report.counts.totalChanges === 0) {
      lines.push(`No changes detected.`);
    } else {
      if (report.counts.newIncorporationCount > 0) {
        lines.push(`- New Incorporations: ${report.counts.newIncorporationCount}`);
      }
      if (report.counts.deregistrationCount > 0) {
        lines.push(`- Deregistrations: ${report.counts.deregistrationCount}`);
      }
      if (report.counts.fieldUpdateCount > 0) {
        lines.push(`- Field Updates: ${report.counts.fieldUpdateCount}`);
      }
    }
    lines.push('');
  });

  lines.push(`---`);
  lines.push(`Total changes: ${result.events.length}`);

  return lines.join('\n');
}
