import { describe, it, expect, vi } from "vitest";
import { ReflectionGenerator } from "./reflection-generator";
import { evaluateOutcome } from "./outcome-evaluator";
import { REFLECTION_SYSTEM_PROMPT } from "../llm/prompts/reflection-prompts";
import type { ChatCompletionClient } from "../types";
import { errorWindow, makeTrade, okWindow } from "../testing/fixtures";

function makeGenerator(
  completeJson: ChatCompletionClient["completeJson"],
  timeoutMs = 1000
) {
  const mock = vi.fn(completeJson);
  const generator = new ReflectionGenerator(
    { completeJson: mock },
    { quoteCurrency: "KRW", previewPoints: 5, timeoutMs }
  );
  return { generator, mock };
}

const trade = makeTrade({ id: 7, decision: "buy", coinKrwPrice: 1000 });
const window = okWindow(1100);
const evaluation = evaluateOutcome(trade, window);

describe("ReflectionGenerator.generate", () => {
  it("returns the reflection text from a well-formed reply", async () => {
    const { generator } = makeGenerator(async () =>
      JSON.stringify({ reflection: "Entry was well timed; size up next time." })
    );

    await expect(generator.generate(trade, window, evaluation)).resolves.toEqual({
      ok: true,
      reflection: "Entry was well timed; size up next time.",
    });
  });

  it("sends the trade context with a bounded price preview", async () => {
    const { generator, mock } = makeGenerator(async () =>
      JSON.stringify({ reflection: "ok" })
    );

    await generator.generate(trade, window, evaluation);

    expect(mock).toHaveBeenCalledTimes(1);
    const [systemPrompt, userPrompt] = mock.mock.calls[0];
    expect(systemPrompt).toBe(REFLECTION_SYSTEM_PROMPT);
    expect(userPrompt).toContain("- Coin: ADA\n- Decision: BUY\n- Trade Price: 1000.00 KRW");
    expect(userPrompt).toContain("- Confidence Score: 75%");
    expect(userPrompt).toContain(
      "- Reasoning: Strong bullish signal on chart with RSI oversold"
    );
    expect(userPrompt).toContain("- Result: GAIN\n- Profit/Loss: 10.00%");
    expect(userPrompt).toContain("Price movement over 24 hours:");
    expect(userPrompt).toContain("  Hour 5: Close 1100.00 KRW\n  ... (19 more hours)");
    expect(userPrompt).not.toContain("Hour 6:");
  });

  it("omits the price preview when the window has no candles", async () => {
    const { generator, mock } = makeGenerator(async () =>
      JSON.stringify({ reflection: "ok" })
    );

    await generator.generate(trade, errorWindow(), evaluation);

    expect(mock.mock.calls[0][1]).not.toContain("Price movement over");
  });

  it("turns a client error into an Error-prefixed failure", async () => {
    const { generator } = makeGenerator(async () => {
      throw new Error("429 Too Many Requests");
    });

    await expect(generator.generate(trade, window, evaluation)).resolves.toEqual({
      ok: false,
      error: "Error generating reflection: 429 Too Many Requests",
    });
  });

  it("rejects a reply that is not JSON", async () => {
    const { generator } = makeGenerator(async () => "I think the trade was fine");

    const result = await generator.generate(trade, window, evaluation);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(
        "Error generating reflection: LLM response is not valid JSON: I think the trade was fine"
      );
    }
  });

  it("rejects a reply without a reflection field", async () => {
    const { generator } = makeGenerator(async () => JSON.stringify({ text: "hi" }));

    const result = await generator.generate(trade, window, evaluation);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith("Error generating reflection: LLM response is not")).toBe(
        true
      );
    }
  });

  it("rejects a blank reflection", async () => {
    const { generator } = makeGenerator(async () => JSON.stringify({ reflection: "   " }));

    const result = await generator.generate(trade, window, evaluation);

    expect(result.ok).toBe(false);
  });

  it("treats a hung request as a failure once the timeout expires", async () => {
    const { generator } = makeGenerator(() => new Promise<string>(() => {}), 20);

    await expect(generator.generate(trade, window, evaluation)).resolves.toEqual({
      ok: false,
      error: "Error generating reflection: Reflection request timed out after 20ms",
    });
  });
});
