import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MarketDataManager, OHLCVFetcher, toMarketSymbol } from "./manager";
import { ExchangeManager, supportedExchanges } from "./exchange-manager";

function makeExchange(impl: OHLCVFetcher["fetchOHLCV"]) {
  const fetchOHLCV = vi.fn(impl);
  return { exchange: { fetchOHLCV }, fetchOHLCV };
}

describe("MarketDataManager.getHourlyOHLCV", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests 1h candles and returns them oldest first", async () => {
    const { exchange, fetchOHLCV } = makeExchange(async () => [
      [3_600_000 * 2, 12, 13, 11, 12.5, 300],
      [3_600_000, 10, 12, 9, 11, 200],
    ]);

    const candles = await new MarketDataManager(exchange).getHourlyOHLCV("ADA/KRW", 2);

    expect(fetchOHLCV).toHaveBeenCalledWith("ADA/KRW", "1h", undefined, 2);
    expect(candles).toEqual([
      { timestamp: 3_600_000, open: 10, high: 12, low: 9, close: 11, volume: 200 },
      { timestamp: 7_200_000, open: 12, high: 13, low: 11, close: 12.5, volume: 300 },
    ]);
  });

  it("drops rows with a missing field", async () => {
    const { exchange } = makeExchange(async () => [
      [3_600_000, 10, 12, 9, undefined, 200],
      [7_200_000, 12, 13, 11, 12.5, 300],
    ]);

    const candles = await new MarketDataManager(exchange).getHourlyOHLCV("ADA/KRW", 2);

    expect(candles.map(c => c.timestamp)).toEqual([7_200_000]);
  });

  it("returns an empty list when the exchange has nothing", async () => {
    const { exchange } = makeExchange(async () => []);

    await expect(new MarketDataManager(exchange).getHourlyOHLCV("NEW/KRW", 24)).resolves.toEqual(
      []
    );
  });

  it("rethrows exchange errors", async () => {
    const { exchange } = makeExchange(async () => {
      throw new Error("DDoSProtection");
    });

    await expect(new MarketDataManager(exchange).getHourlyOHLCV("ADA/KRW", 24)).rejects.toThrow(
      "DDoSProtection"
    );
  });
});

describe("toMarketSymbol", () => {
  it("joins coin and quote in ccxt form", () => {
    expect(toMarketSymbol("ada", "krw")).toBe("ADA/KRW");
    expect(toMarketSymbol("BTC", "USDT")).toBe("BTC/USDT");
  });
});

describe("ExchangeManager", () => {
  it("rejects an exchange id it does not know", () => {
    expect(() => new ExchangeManager("mtgox")).toThrow(
      "Unsupported exchange mtgox (supported: upbit, bithumb, binance, okx)"
    );
  });

  it("lists the supported exchanges", () => {
    expect(supportedExchanges()).toEqual(["upbit", "bithumb", "binance", "okx"]);
  });
});
