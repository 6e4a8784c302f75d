/**
 * Change Detection Types
 *
 * Types for comparing registry snapshots over time.
 */

import type { ChangeEvent, TrackedField } from '@regwatch/core';

/** Per-category event counts */
export interface ChangeCounts {
  newIncorporationCount: number;
  deregistrationCount: number;
  fieldUpdateCount: number;
  totalChanges: number;
}

/** Result of comparing one pair of snapshots */
export interface ChangeReport {
  /** Unique report ID */
  id: string;
  /** Report generation timestamp */
  timestamp: Date;
  /** Change date the events carry */
  changeDate: Date;
  /** Source of the older snapshot (undefined on the first comparison) */
  previousSource?: string;
  /** Source of the newer snapshot */
  currentSource?: string;
  /** Summary statistics */
  counts: ChangeCounts;
  /** Detected events, category-ordered */
  events: ChangeEvent[];
  /** Processing time in milliseconds */
  processingTimeMs: number;
}

/** Options for the change detector */
export interface ChangeDetectorOptions {
  /** Fields to compare for field updates (default: all tracked fields) */
  trackFields?: readonly TrackedField[];
}

/**
 * A snapshot to process: a path, or a path with the observation date used
 * when its rows carry none (needed for a file with no rows at all)
 */
export type SnapshotSource = string | { path: string; snapshotDate?: Date };

/** A snapshot source the processor could not load */
export interface SkippedSnapshot {
  source: string;
  /** LoadError code */
  code: string;
  message: string;
}

/** Outcome of folding the detector over a sequence of snapshots */
export interface ProcessingResult {
  /** All events, in round order */
  events: ChangeEvent[];
  /** Per-round reports */
  reports: ChangeReport[];
  /** Number of detection rounds run */
  rounds: number;
  /** Sources that loaded successfully, in order */
  loaded: string[];
  /** Sources skipped because they failed to load */
  skipped: SkippedSnapshot[];
}
