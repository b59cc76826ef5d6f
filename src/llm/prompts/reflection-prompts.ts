import type { EvaluationResult, TradeDecision } from "../../types";

export const REFLECTION_SYSTEM_PROMPT = `You are an expert cryptocurrency trading analyst. Provide thoughtful, analytical reflections on trading decisions.
Be specific about what worked and what didn't, and extract actionable lessons.

### OUTPUT FORMAT
You MUST return a strictly valid JSON object:
{
  "reflection": "String. Your full reflection on the trade."
}`;

export interface ReflectionPromptParams {
  trade: Pick<
    TradeDecision,
    "coinName" | "decision" | "coinKrwPrice" | "confidenceScore" | "timestamp" | "reason"
  >;
  evaluation: EvaluationResult;
  pricePreview: string;
  quoteCurrency: string;
}

export function buildReflectionUserPrompt(params: ReflectionPromptParams): string {
  const { trade, evaluation, pricePreview, quoteCurrency } = params;

  const tradePrice =
    trade.coinKrwPrice === null
      ? "N/A"
      : `${trade.coinKrwPrice.toFixed(2)} ${quoteCurrency}`;

  return `You are reviewing a past trading decision. Provide a thoughtful reflection on what happened.

### Original Trade Decision
- Coin: ${trade.coinName}
- Decision: ${trade.decision.toUpperCase()}
- Trade Price: ${tradePrice}
- Confidence Score: ${trade.confidenceScore ?? 0}%
- Timestamp: ${trade.timestamp}
- Reasoning: ${trade.reason || "(none recorded)"}

### What Actually Happened
- Result: ${evaluation.resultType.toUpperCase()}
- Profit/Loss: ${(evaluation.profitLoss * 100).toFixed(2)}%
- Description: ${evaluation.resultDescription}
${pricePreview}

### Your Task
Reflect on this trade decision. Consider:
1. **Decision Quality**: Was the reasoning sound? Did it align with good trading principles?
2. **Outcome Analysis**: What factors led to this outcome? Were there signals that were correctly identified or missed?
3. **Confidence Calibration**: Was the confidence score appropriate given the market conditions?
4. **Key Lessons**: What can be learned from this trade for future decisions?

Be specific, analytical, and constructive. Focus on actionable insights.
Return JSON only.`;
}
