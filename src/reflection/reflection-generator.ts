import { z } from "zod";
import type {
  ChatCompletionClient,
  EvaluationResult,
  PriceWindowResult,
  ReflectionResult,
  TradeDecision,
} from "../types";
import { ContextBuilder } from "../llm/context-builder";
import {
  REFLECTION_SYSTEM_PROMPT,
  buildReflectionUserPrompt,
} from "../llm/prompts/reflection-prompts";
import { withTimeout } from "../utils/async";
import { logger, describeError } from "../utils/logger";

export const REFLECTION_ERROR_PREFIX = "Error generating reflection";

const reflectionOutputSchema = z.object({
  reflection: z.string().trim().min(1),
});

export interface ReflectionGeneratorOptions {
  quoteCurrency: string;
  previewPoints: number;
  timeoutMs: number;
}

export class ReflectionGenerator {
  constructor(
    private client: ChatCompletionClient,
    private options: ReflectionGeneratorOptions
  ) {}

  /**
   * Ask the LLM for a retrospective on a judged trade.
   * Failures come back as `{ ok: false }` with an "Error..." message, never thrown.
   */
  public async generate(
    trade: TradeDecision,
    window: PriceWindowResult,
    evaluation: EvaluationResult
  ): Promise<ReflectionResult> {
    const userPrompt = buildReflectionUserPrompt({
      trade,
      evaluation,
      pricePreview: ContextBuilder.buildPricePreview(
        window.candles,
        this.options.previewPoints,
        this.options.quoteCurrency
      ),
      quoteCurrency: this.options.quoteCurrency,
    });

    try {
      const raw = await withTimeout(
        this.client.completeJson(REFLECTION_SYSTEM_PROMPT, userPrompt),
        this.options.timeoutMs,
        "Reflection request"
      );

      const parsed = reflectionOutputSchema.safeParse(parseJson(raw));
      if (!parsed.success) {
        throw new Error(
          `LLM response is not a {"reflection": string} object: ${parsed.error.issues
            .map(i => `${i.path.join(".") || "(root)"} ${i.message}`)
            .join("; ")}`
        );
      }

      return { ok: true, reflection: parsed.data.reflection };
    } catch (error) {
      logger.error(
        `[ReflectionGenerator] Trade ${trade.id} reflection failed: ${describeError(error)}`
      );
      return {
        ok: false,
        error: `${REFLECTION_ERROR_PREFIX}: ${describeError(error)}`,
      };
    }
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`LLM response is not valid JSON: ${raw.slice(0, 200)}`);
  }
}
