import type { HourlyCandleSource, OHLC } from "../types";
import { logger, describeError } from "../utils/logger";

/**
 * The slice of a ccxt exchange used for candle data.
 * ccxt rows are [timestamp, open, high, low, close, volume].
 */
export interface OHLCVFetcher {
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number
  ): Promise<Array<Array<number | undefined>>>;
}

/**
 * Market Data Manager: fetches hourly K-line data for reflection windows.
 * 返回按时间升序排列的 K 线（最旧在前）。
 */
export class MarketDataManager implements HourlyCandleSource {
  constructor(private exchange: OHLCVFetcher) {}

  public async getHourlyOHLCV(
    marketSymbol: string,
    countHours: number
  ): Promise<OHLC[]> {
    try {
      const ohlcv = await this.exchange.fetchOHLCV(
        marketSymbol,
        "1h",
        undefined,
        countHours
      );

      if (!ohlcv || ohlcv.length === 0) {
        logger.warn(`[MarketData] No hourly candles returned for ${marketSymbol}`);
        return [];
      }

      return ohlcv
        .flatMap(toOHLC)
        .sort((a, b) => a.timestamp - b.timestamp);
    } catch (error) {
      logger.error(
        `[MarketData] Failed to fetch hourly OHLCV for ${marketSymbol}: ${describeError(error)}`
      );
      throw error;
    }
  }
}

// 字段缺失的行直接丢弃，不做补零
function toOHLC(row: Array<number | undefined>): OHLC[] {
  const [timestamp, open, high, low, close, volume] = row;
  if (
    timestamp === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined ||
    volume === undefined
  ) {
    return [];
  }
  return [{ timestamp, open, high, low, close, volume }];
}

export function toMarketSymbol(coinName: string, quoteCurrency: string): string {
  return `${coinName.toUpperCase()}/${quoteCurrency.toUpperCase()}`;
}
