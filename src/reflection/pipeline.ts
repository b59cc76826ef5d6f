import type {
  EvaluationResult,
  PriceWindowResult,
  ReflectionResult,
  ReflectionUpdate,
  TradeDecision,
} from "../types";
import { evaluateOutcome } from "./outcome-evaluator";
import { Logger, logger as defaultLogger, describeError } from "../utils/logger";

export interface ReflectionStore {
  selectEligible(coinName?: string | null, minHoursOld?: number | null): TradeDecision[];
  updateReflection(id: number, update: ReflectionUpdate): boolean;
}

export interface PriceWindowSource {
  fetchFutureWindow(
    coinName: string,
    referenceTimestamp: string,
    horizonHours: number
  ): Promise<PriceWindowResult>;
}

export interface ReflectionSource {
  generate(
    trade: TradeDecision,
    window: PriceWindowResult,
    evaluation: EvaluationResult
  ): Promise<ReflectionResult>;
}

export interface ReflectionPipelineDeps {
  store: ReflectionStore;
  priceWindows: PriceWindowSource;
  generator: ReflectionSource;
  quoteCurrency?: string;
  // Below this many hours the outcome is still judged, with a warning
  minRecommendedHours?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface PipelineRunOptions {
  coinName?: string;
  minHoursOld?: number | null;
  horizonHours?: number;
}

/**
 * Where a single trade ended up in this run. Only "reflected" is persisted;
 * every other state leaves the trade pending for the next run.
 */
export type TradeRunState =
  | { state: "reflected"; evaluation: EvaluationResult }
  | { state: "window_unavailable"; error: string }
  | { state: "generation_failed"; evaluation: EvaluationResult; error: string }
  | { state: "not_found"; evaluation: EvaluationResult }
  | { state: "failed"; error: string };

export type TradeRunOutcome = { tradeId: number } & TradeRunState;

export type PipelineVerdict = "profitable" | "losing" | "break-even" | "none";

export interface PipelineSummary {
  total: number;
  processed: number;
  errors: number;
  gains: number;
  losses: number;
  neutral: number;
  totalProfitLoss: number;
  averageProfitLoss: number | null;
  verdict: PipelineVerdict;
  outcomes: TradeRunOutcome[];
}

export class ReflectionPipeline {
  private store: ReflectionStore;
  private priceWindows: PriceWindowSource;
  private generator: ReflectionSource;
  private quoteCurrency: string;
  private minRecommendedHours: number;
  private now: () => Date;
  private logger: Logger;

  constructor(deps: ReflectionPipelineDeps) {
    this.store = deps.store;
    this.priceWindows = deps.priceWindows;
    this.generator = deps.generator;
    this.quoteCurrency = deps.quoteCurrency ?? "KRW";
    this.minRecommendedHours = deps.minRecommendedHours ?? 12;
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * One batch pass: judge and reflect every eligible trade, oldest first.
   * A failing trade is counted and skipped; it never stops the batch.
   */
  public async run(options: PipelineRunOptions = {}): Promise<PipelineSummary> {
    const { coinName, minHoursOld = 24, horizonHours = 24 } = options;

    this.logger.info(
      `[Reflection] Fetching trades without reflection (${minHoursOld ?? 0}+ hours old)...`
    );
    const trades = this.store.selectEligible(coinName ?? null, minHoursOld);

    if (trades.length === 0) {
      this.logger.info("[Reflection] No trades need reflection. All caught up!");
    } else {
      this.logger.info(`[Reflection] Found ${trades.length} trade(s) to analyze`);
    }

    const outcomes: TradeRunOutcome[] = [];
    for (const [index, trade] of trades.entries()) {
      this.logTradeHeader(trade, index + 1, trades.length);

      let state: TradeRunState;
      try {
        state = await this.processTrade(trade, horizonHours);
      } catch (error) {
        this.logger.error(`  ✗ Unexpected error on trade ${trade.id}`, error);
        state = { state: "failed", error: describeError(error) };
      }
      outcomes.push({ tradeId: trade.id, ...state });
    }

    return summarize(outcomes);
  }

  private async processTrade(
    trade: TradeDecision,
    horizonHours: number
  ): Promise<TradeRunState> {
    this.logger.info("  → Fetching future price data...");
    const window = await this.priceWindows.fetchFutureWindow(
      trade.coinName,
      trade.timestamp,
      horizonHours
    );

    if (window.status === "error") {
      this.logger.warn(`  ✗ ${window.error}`);
      return { state: "window_unavailable", error: window.error };
    }

    this.logger.info(`  ✓ Retrieved ${window.hoursAvailable} hours of price data`);
    if (window.hoursAvailable < this.minRecommendedHours) {
      this.logger.warn(
        `  ⚠ Only ${window.hoursAvailable} hours available (minimum ${this.minRecommendedHours} recommended)`
      );
    }

    const evaluation = evaluateOutcome(trade, window, this.quoteCurrency);
    this.logger.info(
      `  ✓ Result: ${evaluation.resultType.toUpperCase()} (${(evaluation.profitLoss * 100).toFixed(2)}%)`
    );
    this.logger.info(`     ${evaluation.resultDescription}`);

    this.logger.info("  → Generating reflection...");
    const reflection = await this.generator.generate(trade, window, evaluation);
    if (!reflection.ok) {
      this.logger.warn(`  ✗ ${reflection.error}`);
      return { state: "generation_failed", evaluation, error: reflection.error };
    }
    this.logger.info(`  ✓ Generated reflection (${reflection.reflection.length} chars)`);

    const updated = this.store.updateReflection(trade.id, {
      reflectionTimestamp: this.now().toISOString(),
      resultType: evaluation.resultType,
      resultDescription: evaluation.resultDescription,
      reflection: reflection.reflection,
      profitLoss: evaluation.profitLoss,
    });

    if (!updated) {
      this.logger.warn(`  ✗ Trade ${trade.id} no longer exists, reflection not saved`);
      return { state: "not_found", evaluation };
    }

    this.logger.info("  ✓ Database updated");
    return { state: "reflected", evaluation };
  }

  private logTradeHeader(trade: TradeDecision, position: number, total: number) {
    const price =
      trade.coinKrwPrice === null ? "N/A" : `${trade.coinKrwPrice.toFixed(2)} ${this.quoteCurrency}`;
    this.logger.info(`[${position}/${total}] Processing trade ID ${trade.id}`);
    this.logger.info(`  Coin: ${trade.coinName}`);
    this.logger.info(`  Decision: ${trade.decision.toUpperCase()}`);
    this.logger.info(`  Timestamp: ${trade.timestamp}`);
    this.logger.info(`  Price: ${price}`);
  }
}

export function summarize(outcomes: TradeRunOutcome[]): PipelineSummary {
  const summary: PipelineSummary = {
    total: outcomes.length,
    processed: 0,
    errors: 0,
    gains: 0,
    losses: 0,
    neutral: 0,
    totalProfitLoss: 0,
    averageProfitLoss: null,
    verdict: "none",
    outcomes,
  };

  for (const outcome of outcomes) {
    if (outcome.state !== "reflected") {
      summary.errors += 1;
      continue;
    }

    summary.processed += 1;
    summary.totalProfitLoss += outcome.evaluation.profitLoss;
    if (outcome.evaluation.resultType === "gain") summary.gains += 1;
    else if (outcome.evaluation.resultType === "loss") summary.losses += 1;
    else summary.neutral += 1;
  }

  if (summary.processed > 0) {
    const avg = summary.totalProfitLoss / summary.processed;
    summary.averageProfitLoss = avg;
    summary.verdict = avg > 0 ? "profitable" : avg < 0 ? "losing" : "break-even";
  }

  return summary;
}

const VERDICT_LINES: Record<Exclude<PipelineVerdict, "none">, string> = {
  profitable: "📈 Overall: Profitable trading decisions",
  losing: "📉 Overall: Losing trading decisions",
  "break-even": "➡️  Overall: Break-even trading decisions",
};

export function formatSummary(summary: PipelineSummary): string[] {
  const lines = [
    "=".repeat(60),
    "SUMMARY",
    "=".repeat(60),
    `Total trades analyzed:    ${summary.total}`,
    `Successfully processed:   ${summary.processed}`,
    `Errors:                   ${summary.errors}`,
    "",
    "Results Breakdown:",
    `  Gains:    ${summary.gains}`,
    `  Losses:   ${summary.losses}`,
    `  Neutral:  ${summary.neutral}`,
  ];

  if (summary.averageProfitLoss !== null && summary.verdict !== "none") {
    lines.push("");
    lines.push(`Average Profit/Loss: ${(summary.averageProfitLoss * 100).toFixed(2)}%`);
    lines.push(VERDICT_LINES[summary.verdict]);
  }

  return lines;
}
