import type { TradeDecision } from "../types";
import { parseDecision } from "../reflection/outcome-evaluator";

export interface DecisionStats {
  total: number;
  buys: number;
  sells: number;
  holds: number;
  realTrades: number;
  simulatedTrades: number;
  unknownTradeMode: number;
  averageConfidence: number | null;
  reflected: number;
  averageProfitLoss: number | null;
  // Share of "gain" among decisions that have a result type, 0..1
  winRate: number | null;
}

export function summarizeDecisions(records: TradeDecision[]): DecisionStats {
  let buys = 0;
  let sells = 0;
  let holds = 0;
  let realTrades = 0;
  let simulatedTrades = 0;
  let unknownTradeMode = 0;
  let reflected = 0;
  const confidences: number[] = [];
  const profitLosses: number[] = [];
  let classified = 0;
  let gains = 0;

  for (const record of records) {
    const decision = parseDecision(record.decision);
    if (decision === "buy") buys++;
    else if (decision === "sell") sells++;
    else if (decision === "hold") holds++;

    if (record.isRealTrade === true) realTrades++;
    else if (record.isRealTrade === false) simulatedTrades++;
    else unknownTradeMode++;

    if (record.confidenceScore !== null) confidences.push(record.confidenceScore);
    if (record.reflection.trim() !== "") reflected++;
    if (record.profitLoss !== null) profitLosses.push(record.profitLoss);

    if (record.resultType !== "") {
      classified++;
      if (record.resultType === "gain") gains++;
    }
  }

  return {
    total: records.length,
    buys,
    sells,
    holds,
    realTrades,
    simulatedTrades,
    unknownTradeMode,
    averageConfidence: mean(confidences),
    reflected,
    averageProfitLoss: mean(profitLosses),
    winRate: classified > 0 ? gains / classified : null,
  };
}

export function formatDecisionStats(stats: DecisionStats): string[] {
  const pct = (v: number | null) => (v === null ? "-" : `${(v * 100).toFixed(2)}%`);
  return [
    `Total records:           ${stats.total}`,
    `Buy / Sell / Hold:       ${stats.buys} / ${stats.sells} / ${stats.holds}`,
    `Real / Simulated / ?:    ${stats.realTrades} / ${stats.simulatedTrades} / ${stats.unknownTradeMode}`,
    `Avg confidence:          ${stats.averageConfidence === null ? "-" : stats.averageConfidence.toFixed(1)}`,
    `Reflections generated:   ${stats.reflected}`,
    `Avg profit/loss:         ${pct(stats.averageProfitLoss)}`,
    `Win rate:                ${pct(stats.winRate)}`,
  ];
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}
