/**
 * Types for bar feeds
 */

import type { Bar } from '../types.js';

export interface CsvBarFeedConfig {
  /** Path to a CSV file with timestamp and close columns */
  filePath: string;
}

export interface SkippedRow {
  /** 1-based line number in the source */
  line: number;
  reason: string;
}

export interface ParsedBars {
  bars: Bar[];
  skipped: SkippedRow[];
}

export type BarFeedEvents = {
  bar: [bar: Bar];
  end: [count: number];
  error: [error: Error];
};
