import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import { logger } from "../utils/logger";

// 支持的现货交易所（仅使用公开行情接口，无需 API Key）
const EXCHANGE_FACTORIES: Record<string, () => Exchange> = {
  upbit: () => new ccxt.upbit({ enableRateLimit: true }),
  bithumb: () => new ccxt.bithumb({ enableRateLimit: true }),
  binance: () => new ccxt.binance({ enableRateLimit: true }),
  okx: () => new ccxt.okx({ enableRateLimit: true }),
};

export function supportedExchanges(): string[] {
  return Object.keys(EXCHANGE_FACTORIES);
}

export class ExchangeManager {
  private exchange: Exchange;

  constructor(exchangeId: string) {
    const factory = EXCHANGE_FACTORIES[exchangeId];

    if (!factory) {
      throw new Error(
        `Unsupported exchange ${exchangeId} (supported: ${supportedExchanges().join(", ")})`
      );
    }

    this.exchange = factory();
    logger.info(`[ExchangeManager] Using ${this.exchange.id} public market data`);
  }

  public getExchange(): Exchange {
    return this.exchange;
  }
}
