import type {
  DecisionType,
  EvaluationResult,
  PriceWindowResult,
  ResultType,
  TradeDecision,
} from "../types";

/**
 * Moves inside ±1% are treated as noise. The band is open: exactly ±0.01 is neutral.
 */
export const NEUTRAL_BAND = 0.01;

export function classifyProfitLoss(profitLoss: number): ResultType {
  if (profitLoss > NEUTRAL_BAND) return "gain";
  if (profitLoss < -NEUTRAL_BAND) return "loss";
  return "neutral";
}

export function parseDecision(raw: string): DecisionType | null {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "buy") return "buy";
  if (normalized === "sell") return "sell";
  if (normalized === "hold") return "hold";
  return null;
}

/**
 * Judge a past decision against the average close of the hours that followed it.
 *
 * profitLoss is signed so that positive always means "good call": a buy gains
 * when the price rises, a sell gains when the price falls afterwards.
 */
export function evaluateOutcome(
  trade: Pick<TradeDecision, "decision" | "coinKrwPrice">,
  window: PriceWindowResult,
  quoteCurrency: string = "KRW"
): EvaluationResult {
  if (window.status === "error" || window.hoursAvailable === 0) {
    return neutral("Insufficient future price data to analyze outcome");
  }

  const decision = parseDecision(trade.decision);
  if (!decision) {
    return neutral(`Unknown decision type: ${trade.decision}`);
  }

  const avgPrice = window.avgPrice;
  const hours = window.hoursAvailable;
  const to = `${fmt(avgPrice)} ${quoteCurrency}`;
  const span = `(avg over ${hours}h)`;

  // Hold needs no trade price
  if (decision === "hold") {
    const from =
      trade.coinKrwPrice === null ? "N/A" : `${fmt(trade.coinKrwPrice)} ${quoteCurrency}`;
    return {
      resultType: "neutral",
      resultDescription: `HOLD decision. Price moved from ${from} to ${to} ${span}. No trade executed.`,
      profitLoss: 0.0,
    };
  }

  const tradePrice = trade.coinKrwPrice;
  if (tradePrice === null || !(tradePrice > 0)) {
    return neutral(
      `${decision.toUpperCase()} decision has no recorded trade price, cannot analyze outcome`
    );
  }
  const from = `${fmt(tradePrice)} ${quoteCurrency}`;

  if (decision === "buy") {
    const profitLoss = (avgPrice - tradePrice) / tradePrice;
    const pct = fmt(profitLoss * 100);
    const resultType = classifyProfitLoss(profitLoss);

    const outcome =
      resultType === "gain"
        ? `Price increased to ${to} ${span}. Profit: ${pct}%`
        : resultType === "loss"
          ? `Price decreased to ${to} ${span}. Loss: ${pct}%`
          : `Price remained stable at ${to} ${span}. Change: ${pct}%`;

    return {
      resultType,
      resultDescription: `BUY at ${from}. ${outcome}`,
      profitLoss,
    };
  }

  // Sell: inverted sign, the seller profits from a subsequent drop
  const profitLoss = (tradePrice - avgPrice) / tradePrice;
  const priceChangePct = -profitLoss * 100;
  const resultType = classifyProfitLoss(profitLoss);

  const outcome =
    resultType === "gain"
      ? `Price dropped to ${to} ${span}. Good timing, avoided an ${fmt(Math.abs(priceChangePct))}% drop`
      : resultType === "loss"
        ? `Price rose to ${to} ${span}. Sold too early, missed an ${fmt(priceChangePct)}% gain`
        : `Price remained stable at ${to} ${span}. Change: ${fmt(priceChangePct)}%`;

  return {
    resultType,
    resultDescription: `SELL at ${from}. ${outcome}`,
    profitLoss,
  };
}

function neutral(resultDescription: string): EvaluationResult {
  return { resultType: "neutral", resultDescription, profitLoss: 0.0 };
}

function fmt(value: number): string {
  return value.toFixed(2);
}
