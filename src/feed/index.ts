export { CsvBarFeed, parseBarsCsv, parseTimestamp } from './CsvBarFeed.js';
export type { CsvBarFeedConfig, ParsedBars, SkippedRow, BarFeedEvents } from './types.js';
