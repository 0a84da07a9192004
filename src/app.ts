/**
 * Application
 *
 * Backtest host that wires all modules together:
 * Bar Feed → Simulated Broker (mark) → Strategy Engine → Simulated Broker (fill)
 */

import { logger, round } from './logger.js';
import { config as defaultConfig, type Config } from './config.js';
import { CsvBarFeed } from './feed/index.js';
import { SimulatedBroker } from './execution/index.js';
import { StrategyEngine, netPosition } from './strategy/index.js';
import { TrendQuality, createChannelIndicator } from './indicators/index.js';
import type { ChannelSettings } from './indicators/index.js';
import type { PositionLedger } from './strategy/index.js';
import type { AccountSnapshot } from './execution/index.js';

export interface RunSummary {
  symbol: string;
  barsDelivered: number;
  barsProcessed: number;
  orders: number;
  netPosition: number;
  ledger: PositionLedger;
  account: AccountSnapshot;
  returnPercent: number;
}

function channelSettings(appConfig: Config): ChannelSettings {
  if (appConfig.channel.type === 'bollinger') {
    return { type: 'bollinger', ...appConfig.bollingerBands };
  }
  return { type: 'linreg', ...appConfig.linearRegression };
}

export class App {
  private readonly appConfig: Config;
  private readonly feed: CsvBarFeed;
  private readonly broker: SimulatedBroker;
  private readonly strategyEngine: StrategyEngine;
  private orders = 0;

  constructor(appConfig: Config = defaultConfig) {
    this.appConfig = appConfig;

    // Initialize Bar Feed
    this.feed = new CsvBarFeed({ filePath: appConfig.backtest.barsFile });

    // Initialize Simulated Broker
    this.broker = new SimulatedBroker({
      symbol: appConfig.backtest.symbol,
      initialCash: appConfig.backtest.initialCash,
      leverage: appConfig.backtest.leverage,
    });

    // Initialize Strategy Engine
    this.strategyEngine = new StrategyEngine(
      {
        symbol: appConfig.backtest.symbol,
        regime: {
          ...appConfig.regime,
          entryAllocation: appConfig.backtest.entryAllocation,
        },
      },
      createChannelIndicator(channelSettings(appConfig)),
      new TrendQuality(appConfig.trendQuality),
      this.broker
    );

    this.setupEventPipeline();
  }

  /**
   * Setup the event-driven pipeline connecting all modules
   * Flow: Bar Feed → Strategy Engine → Broker
   */
  private setupEventPipeline(): void {
    this.feed.on('bar', (bar) => {
      this.broker.markPrice(bar);
      this.strategyEngine.processBar(bar);
    });

    this.strategyEngine.on('orderPlaced', ({ bar, action }) => {
      this.orders += 1;
      logger.debug('Order recorded', {
        timestamp: new Date(bar.timestamp).toISOString(),
        tag: action.tag,
        filled: action.filledQuantity,
      });
    });

    this.feed.on('error', (error) => {
      logger.error('Bar replay aborted', { error: error.message });
    });
  }

  /**
   * Replay every bar and summarize the run
   */
  async run(): Promise<RunSummary> {
    logger.info('Starting backtest', {
      symbol: this.appConfig.backtest.symbol,
      barsFile: this.appConfig.backtest.barsFile,
      channel: this.appConfig.channel.type,
    });

    const barsDelivered = await this.feed.replay();
    const summary = this.getSummary(barsDelivered);

    logger.info('Backtest complete', {
      bars: summary.barsProcessed,
      orders: summary.orders,
      netPosition: summary.netPosition,
      equity: summary.account.equity,
      returnPercent: summary.returnPercent,
    });

    return summary;
  }

  private getSummary(barsDelivered: number): RunSummary {
    const account = this.broker.getAccount();
    const ledger = this.strategyEngine.getLedger();
    const initialCash = this.appConfig.backtest.initialCash;

    return {
      symbol: this.appConfig.backtest.symbol,
      barsDelivered,
      barsProcessed: this.strategyEngine.getBarsProcessed(),
      orders: this.orders,
      netPosition: netPosition(ledger),
      ledger,
      account,
      returnPercent: initialCash > 0 ? round(((account.equity - initialCash) / initialCash) * 100, 2) : 0,
    };
  }
}
