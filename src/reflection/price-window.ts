import type {
  HourlyCandleSource,
  OHLC,
  PriceWindowError,
  PriceWindowErrorReason,
  PriceWindowResult,
} from "../types";
import { toMarketSymbol } from "../market/manager";
import { describeError } from "../utils/logger";

export const HOUR_MS = 60 * 60 * 1000;

export interface PriceWindowFetcherOptions {
  quoteCurrency: string;
  // Exchanges only serve a trailing window of candles (200 on Upbit)
  maxLookbackCandles: number;
  now?: () => Date;
}

/**
 * Fetches the hourly candles that followed a trade, i.e. the window
 * (referenceTime, referenceTime + horizonHours].
 *
 * Expected conditions (trade too recent, no data, upstream failure) come back
 * as a `status: "error"` result; this never throws for them.
 */
export class PriceWindowFetcher {
  private quoteCurrency: string;
  private maxLookbackCandles: number;
  private now: () => Date;

  constructor(
    private candleSource: HourlyCandleSource,
    options: PriceWindowFetcherOptions
  ) {
    this.quoteCurrency = options.quoteCurrency;
    this.maxLookbackCandles = options.maxLookbackCandles;
    this.now = options.now ?? (() => new Date());
  }

  public async fetchFutureWindow(
    coinName: string,
    referenceTimestamp: string,
    horizonHours: number = 24
  ): Promise<PriceWindowResult> {
    const referenceMs = Date.parse(referenceTimestamp);
    if (Number.isNaN(referenceMs)) {
      return windowError(
        referenceTimestamp,
        "invalid_timestamp",
        `Invalid trade timestamp: ${referenceTimestamp}`
      );
    }

    const hoursElapsed = (this.now().getTime() - referenceMs) / HOUR_MS;
    const hoursAvailable = Math.min(horizonHours, Math.floor(hoursElapsed));

    if (hoursAvailable < 1) {
      return windowError(
        referenceTimestamp,
        "too_recent",
        "Trade is too recent, no future data available"
      );
    }

    try {
      // Enough trailing candles to reach back past the trade, capped by the exchange limit
      const count = Math.min(
        this.maxLookbackCandles,
        Math.ceil(hoursElapsed) + 1
      );
      const candles = await this.candleSource.getHourlyOHLCV(
        toMarketSymbol(coinName, this.quoteCurrency),
        count
      );

      if (!candles || candles.length === 0) {
        return windowError(
          referenceTimestamp,
          "no_data",
          "No price data available"
        );
      }

      const windowEndMs = referenceMs + horizonHours * HOUR_MS;
      const inWindow = candles
        .filter(c => c.timestamp > referenceMs && c.timestamp <= windowEndMs)
        .sort((a, b) => a.timestamp - b.timestamp);

      if (inWindow.length === 0) {
        return windowError(
          referenceTimestamp,
          "empty_window",
          "No data in the specified time range"
        );
      }

      const first = inWindow[0];
      const last = inWindow[inWindow.length - 1];

      return {
        status: "ok",
        candles: inWindow,
        hoursAvailable: inWindow.length,
        startTime: new Date(first.timestamp).toISOString(),
        endTime: new Date(last.timestamp).toISOString(),
        avgPrice: averageClose(inWindow),
      };
    } catch (error) {
      return windowError(
        referenceTimestamp,
        "fetch_failed",
        `Error fetching price data: ${describeError(error)}`
      );
    }
  }
}

export function averageClose(candles: OHLC[]): number {
  const sum = candles.reduce((acc, c) => acc + c.close, 0);
  return sum / candles.length;
}

function windowError(
  referenceTimestamp: string,
  reason: PriceWindowErrorReason,
  error: string
): PriceWindowError {
  return {
    status: "error",
    reason,
    error,
    candles: [],
    hoursAvailable: 0,
    startTime: referenceTimestamp,
    endTime: referenceTimestamp,
    avgPrice: null,
  };
}
