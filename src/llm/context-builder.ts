import type { OHLC } from "../types";

export class ContextBuilder {
  /**
   * Abbreviated close-price series for the reflection prompt.
   * Only the first `maxPoints` hours are listed so the prompt stays small.
   */
  public static buildPricePreview(
    candles: OHLC[],
    maxPoints: number,
    quoteCurrency: string
  ): string {
    if (candles.length === 0) return "";

    const lines = [`Price movement over ${candles.length} hours:`];
    candles.slice(0, maxPoints).forEach((c, i) => {
      lines.push(`  Hour ${i + 1}: Close ${c.close.toFixed(2)} ${quoteCurrency}`);
    });

    const remaining = candles.length - maxPoints;
    if (remaining > 0) {
      lines.push(`  ... (${remaining} more hours)`);
    }

    return lines.join("\n");
  }
}
