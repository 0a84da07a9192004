/**
 * CSV Bar Feed
 *
 * Replays recorded bars from a CSV file in timestamp order. Accepts an
 * optional header naming `timestamp`/`time`/`date` and `close` columns;
 * without one, the first two columns are timestamp and close.
 */

import { readFile } from 'fs/promises';
import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import type { Bar } from '../types.js';
import type { BarFeedEvents, CsvBarFeedConfig, ParsedBars } from './types.js';

const TIMESTAMP_COLUMNS = ['timestamp', 'time', 'date', 'datetime'];

interface ColumnLayout {
  timestamp: number;
  close: number;
}

/**
 * Epoch milliseconds from an integer string or an ISO-8601 date
 */
export function parseTimestamp(raw: string): number {
  const value = raw.trim();
  if (/^\d+$/.test(value)) {
    return Number(value);
  }
  return Date.parse(value);
}

function detectHeader(cells: string[]): ColumnLayout | null {
  const names = cells.map((cell) => cell.trim().toLowerCase());
  const close = names.indexOf('close');
  const timestamp = names.findIndex((name) => TIMESTAMP_COLUMNS.includes(name));
  if (close === -1 || timestamp === -1) {
    return null;
  }
  return { timestamp, close };
}

/**
 * Parse CSV text into bars, skipping blank lines, `#` comments and rows
 * that are malformed or not strictly after the previous bar
 */
export function parseBarsCsv(text: string): ParsedBars {
  const result: ParsedBars = { bars: [], skipped: [] };
  let layout: ColumnLayout = { timestamp: 0, close: 1 };
  let headerChecked = false;
  let lastTimestamp = Number.NEGATIVE_INFINITY;

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const cells = line.split(',');
    if (!headerChecked) {
      headerChecked = true;
      const header = detectHeader(cells);
      if (header) {
        layout = header;
        return;
      }
    }

    const lineNumber = index + 1;
    const rawTimestamp = cells[layout.timestamp];
    const rawClose = cells[layout.close];
    if (rawTimestamp === undefined || rawClose === undefined) {
      result.skipped.push({ line: lineNumber, reason: 'missing columns' });
      return;
    }

    const timestamp = parseTimestamp(rawTimestamp);
    const close = Number(rawClose.trim());
    if (!Number.isFinite(timestamp) || rawClose.trim() === '' || !Number.isFinite(close)) {
      result.skipped.push({ line: lineNumber, reason: 'non-finite timestamp or close' });
      return;
    }

    if (timestamp <= lastTimestamp) {
      result.skipped.push({ line: lineNumber, reason: 'out of order' });
      return;
    }

    lastTimestamp = timestamp;
    result.bars.push({ timestamp, close });
  });

  return result;
}

export class CsvBarFeed extends EventEmitter<BarFeedEvents> {
  private readonly config: CsvBarFeedConfig;

  constructor(config: CsvBarFeedConfig) {
    super();
    this.config = config;
  }

  /**
   * Read and parse the configured file
   */
  async load(): Promise<Bar[]> {
    let text: string;
    try {
      text = await readFile(this.config.filePath, 'utf8');
    } catch (error) {
      logger.error('Failed to read bars file', {
        filePath: this.config.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const { bars, skipped } = parseBarsCsv(text);
    for (const row of skipped) {
      logger.warn('Skipping CSV row', { filePath: this.config.filePath, ...row });
    }

    logger.info('Bars loaded', {
      filePath: this.config.filePath,
      bars: bars.length,
      skipped: skipped.length,
    });
    return bars;
  }

  /**
   * Emit every bar in order, then `end`
   * @returns number of bars delivered
   */
  async replay(): Promise<number> {
    const bars = await this.load();

    for (const bar of bars) {
      try {
        this.emit('bar', bar);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
        throw err;
      }
    }

    this.emit('end', bars.length);
    return bars.length;
  }
}
