import type { OHLC, PriceWindow, PriceWindowError, TradeDecision } from "../types";

export const HOUR = 60 * 60 * 1000;

// Fixed clock used across suites: on the hour so candle grids line up
export const NOW = new Date("2026-03-10T12:00:00.000Z");

export function hoursAgo(hours: number, now: Date = NOW): string {
  return new Date(now.getTime() - hours * HOUR).toISOString();
}

export function makeTrade(overrides: Partial<TradeDecision> = {}): TradeDecision {
  return {
    id: 1,
    timestamp: hoursAgo(25),
    decision: "buy",
    confidenceScore: 75,
    reason: "Strong bullish signal on chart with RSI oversold",
    coinName: "ADA",
    coinBalance: 1000,
    krwBalance: 500000,
    coinAvgBuyPrice: 500,
    coinKrwPrice: 1000,
    tradeAmount: 100000,
    isRealTrade: false,
    reflectionTimestamp: "",
    resultType: "",
    resultDescription: "",
    reflection: "",
    profitLoss: null,
    ...overrides,
  };
}

export function makeCandle(timestamp: number, close: number): OHLC {
  return {
    timestamp,
    open: close,
    high: close + 10,
    low: close - 10,
    close,
    volume: 1_000_000,
  };
}

/**
 * A successful window whose closes all equal `avgPrice`.
 */
export function okWindow(avgPrice: number, hours: number = 24): PriceWindow {
  const start = NOW.getTime() - hours * HOUR;
  const candles = Array.from({ length: hours }, (_, i) =>
    makeCandle(start + (i + 1) * HOUR, avgPrice)
  );
  return {
    status: "ok",
    candles,
    hoursAvailable: hours,
    startTime: new Date(candles[0].timestamp).toISOString(),
    endTime: new Date(candles[candles.length - 1].timestamp).toISOString(),
    avgPrice,
  };
}

/**
 * A successful window with a steadily rising close, mean `1105 + 5 * (hours - 1)`.
 */
export function trendingWindow(hours: number = 24): PriceWindow {
  const start = NOW.getTime() - hours * HOUR;
  const candles = Array.from({ length: hours }, (_, i) =>
    makeCandle(start + (i + 1) * HOUR, 1105 + i * 10)
  );
  const avgPrice = candles.reduce((a, c) => a + c.close, 0) / candles.length;
  return {
    status: "ok",
    candles,
    hoursAvailable: hours,
    startTime: new Date(candles[0].timestamp).toISOString(),
    endTime: new Date(candles[candles.length - 1].timestamp).toISOString(),
    avgPrice,
  };
}

export function errorWindow(
  error: string = "No price data available"
): PriceWindowError {
  return {
    status: "error",
    reason: "no_data",
    error,
    candles: [],
    hoursAvailable: 0,
    startTime: hoursAgo(25),
    endTime: hoursAgo(25),
    avgPrice: null,
  };
}
