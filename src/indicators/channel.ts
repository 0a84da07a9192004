import { BollingerChannel } from './BollingerChannel.js';
import { LinearRegressionChannel } from './LinearRegressionChannel.js';
import type { ChannelIndicator, ChannelSettings, ChannelSnapshot } from './types.js';

/**
 * Build the channel source selected by configuration
 */
export function createChannelIndicator(settings: ChannelSettings): ChannelIndicator {
  switch (settings.type) {
    case 'linreg':
      return new LinearRegressionChannel({
        count: settings.count,
        upperDeviation: settings.upperDeviation,
        lowerDeviation: settings.lowerDeviation,
      });
    case 'bollinger':
      return new BollingerChannel({
        length: settings.length,
        multiplier: settings.multiplier,
      });
  }
}

export function snapshotChannel(channel: ChannelIndicator): ChannelSnapshot {
  return {
    upper: channel.upperBand,
    middle: channel.middle,
    lower: channel.lowerBand,
  };
}
