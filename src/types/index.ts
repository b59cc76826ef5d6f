/**
 * Core type definitions for the trade reflection pipeline
 */

export interface OHLC {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type DecisionType = "buy" | "sell" | "hold";

export type ResultType = "gain" | "loss" | "neutral";

/**
 * A single buy/sell/hold call as recorded by the decision-making bot,
 * with the portfolio snapshot taken at decision time.
 */
export interface TradeDecision {
  id: number;
  timestamp: string;
  // Raw stored value; anything other than buy/sell/hold is evaluated as unknown
  decision: string;
  confidenceScore: number | null;
  reason: string | null;
  coinName: string;
  coinBalance: number | null;
  krwBalance: number | null;
  coinAvgBuyPrice: number | null;
  coinKrwPrice: number | null;
  tradeAmount: number | null;
  isRealTrade: boolean | null;

  reflectionTimestamp: string;
  resultType: ResultType | "";
  resultDescription: string;
  reflection: string;
  profitLoss: number | null;
}

export type NewTradeDecision = Pick<TradeDecision, "decision" | "coinName"> &
  Partial<
    Pick<
      TradeDecision,
      | "timestamp"
      | "confidenceScore"
      | "reason"
      | "coinBalance"
      | "krwBalance"
      | "coinAvgBuyPrice"
      | "coinKrwPrice"
      | "tradeAmount"
      | "isRealTrade"
    >
  >;

export interface ReflectionUpdate {
  reflectionTimestamp: string;
  resultType: ResultType;
  resultDescription: string;
  reflection: string;
  profitLoss: number;
}

export type PriceWindowErrorReason =
  | "too_recent"
  | "no_data"
  | "empty_window"
  | "invalid_timestamp"
  | "fetch_failed";

export interface PriceWindow {
  status: "ok";
  candles: OHLC[];
  hoursAvailable: number;
  startTime: string;
  endTime: string;
  avgPrice: number;
}

export interface PriceWindowError {
  status: "error";
  reason: PriceWindowErrorReason;
  error: string;
  candles: [];
  hoursAvailable: 0;
  startTime: string;
  endTime: string;
  avgPrice: null;
}

export type PriceWindowResult = PriceWindow | PriceWindowError;

export interface EvaluationResult {
  resultType: ResultType;
  resultDescription: string;
  profitLoss: number;
}

export type ReflectionResult =
  | { ok: true; reflection: string }
  | { ok: false; error: string };

/**
 * Source of hourly candles. Implementations return candles in chronological
 * order (oldest first) and an empty array when the market has no data.
 */
export interface HourlyCandleSource {
  getHourlyOHLCV(marketSymbol: string, countHours: number): Promise<OHLC[]>;
}

/**
 * Text-generation collaborator. Resolves to the raw JSON text of the reply.
 */
export interface ChatCompletionClient {
  completeJson(systemPrompt: string, userPrompt: string): Promise<string>;
}
