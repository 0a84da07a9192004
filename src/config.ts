import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

function getEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T
): T {
  const value = getEnvVar(key, defaultValue).toLowerCase();
  const match = choices.find((choice) => choice.toLowerCase() === value);
  if (match === undefined) {
    throw new Error(
      `Environment variable ${key} must be one of: ${choices.join(', ')}`
    );
  }
  return match;
}

export const CHANNEL_TYPES = ['linreg', 'bollinger'] as const;

export const config = {
  // Backtest host
  backtest: {
    symbol: getEnvVar('SYMBOL', 'QQQ'),

    /** CSV file with timestamp,close rows */
    barsFile: getEnvVar('BARS_FILE', 'data/sample-bars.csv'),

    initialCash: getEnvNumber('INITIAL_CASH', 100000),

    /** Buying power multiple of equity */
    leverage: getEnvNumber('LEVERAGE', 2),

    /** Fraction of equity sized into every entry order (0.5 = 50%) */
    entryAllocation: getEnvNumber('ENTRY_ALLOCATION', 0.5),
  },

  // Channel Configuration
  channel: {
    type: getEnvChoice('CHANNEL_TYPE', CHANNEL_TYPES, 'linreg'),
  },

  // Linear Regression Channel Configuration
  linearRegression: {
    count: getEnvNumber('LINREG_COUNT', 100),
    upperDeviation: getEnvNumber('LINREG_UPPER_DEVIATION', 2),
    lowerDeviation: getEnvNumber('LINREG_LOWER_DEVIATION', 2),
  },

  // Bollinger Bands Configuration
  bollingerBands: {
    length: getEnvNumber('BB_LENGTH', 20),
    multiplier: getEnvNumber('BB_MULT', 2),
  },

  // Trend-Quality Configuration
  trendQuality: {
    fastLength: getEnvNumber('TQ_FAST_LENGTH', 7),
    slowLength: getEnvNumber('TQ_SLOW_LENGTH', 15),
    trendLength: getEnvNumber('TQ_TREND_LENGTH', 4),
    noiseLength: getEnvNumber('TQ_NOISE_LENGTH', 250),
    correctionFactor: getEnvNumber('TQ_CORRECTION_FACTOR', 2),
    noiseType: getEnvVar('TQ_NOISE_TYPE', 'LINEAR'),
  },

  // Regime Signal Configuration
  regime: {
    lowThreshold: getEnvNumber('LOW_THRESHOLD', -4),
    highThreshold: getEnvNumber('HIGH_THRESHOLD', 2.5),

    /** Exit bounds are tightened by close * betweenFactor */
    betweenFactor: getEnvNumber('BETWEEN_FACTOR', 0.0005),

    /** Pyramiding cap per leg */
    maxOrders: getEnvNumber('MAX_ORDERS', 3),

    enabledEntries: {
      reversionShort: getEnvBoolean('REVERSION_SHORT_ENABLED', true),
      reversionLong: getEnvBoolean('REVERSION_LONG_ENABLED', true),
      breakoutLong: getEnvBoolean('BREAKOUT_LONG_ENABLED', true),
      breakoutShort: getEnvBoolean('BREAKOUT_SHORT_ENABLED', true),
    },
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    fileEnabled: getEnvBoolean('LOG_FILE_ENABLED', true),
    dir: getEnvVar('LOG_DIR', 'logs'),
  },
} as const;

export type Config = typeof config;
