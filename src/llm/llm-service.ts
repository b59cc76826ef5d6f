import OpenAI from "openai";
import fs from "fs";
import path from "path";
import type { AppConfig } from "../config/config";
import type { ChatCompletionClient } from "../types";
import { logger, describeError } from "../utils/logger";

interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export class LLMService implements ChatCompletionClient {
  private openai: OpenAI;
  private model: string;
  private logInteractions: boolean;

  constructor(
    llmConfig: AppConfig["llm"],
    private interactionType = "REFLECTION",
    private interactionLogDir = path.resolve(process.cwd(), "output", "chat")
  ) {
    this.openai = new OpenAI({
      baseURL: llmConfig.baseUrl,
      apiKey: llmConfig.apiKey,
      timeout: llmConfig.timeoutMs,
      maxRetries: llmConfig.maxRetries,
    });
    this.model = llmConfig.model;
    this.logInteractions = llmConfig.logInteractions;
  }

  /**
   * Test the LLM endpoint by listing models
   */
  public async testConnection(): Promise<boolean> {
    try {
      logger.info(`Testing LLM connection (${this.model})...`);
      await this.openai.models.list();
      logger.info("LLM connection OK");
      return true;
    } catch (error) {
      logger.error(`LLM connection failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Send a system + user prompt and return the raw JSON content of the reply.
   * Throws on transport errors and on an empty reply.
   */
  public async completeJson(
    systemPrompt: string,
    userPrompt: string
  ): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      response_format: { type: "json_object" },
    });

    this.logTokenUsage(response.usage);

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error("LLM returned an empty response");
    }

    await this.saveInteractionLog(systemPrompt, userPrompt, content, response.usage);

    return content;
  }

  private logTokenUsage(usage: TokenUsage | undefined) {
    if (!usage) return;
    const promptK = (usage.prompt_tokens / 1000).toFixed(3);
    const completionK = (usage.completion_tokens / 1000).toFixed(3);
    const totalK = (usage.total_tokens / 1000).toFixed(3);
    logger.info(
      `[Token usage] prompt: ${promptK}k | completion: ${completionK}k | total: ${totalK}k`
    );
  }

  /**
   * 每次交互追加一行 JSON 到 <dir>/<YYYY-MM-DD>_<type>.jsonl，失败只记录日志。
   */
  private async saveInteractionLog(
    systemPrompt: string,
    userPrompt: string,
    response: string,
    usage: TokenUsage | undefined
  ) {
    if (!this.logInteractions) return;

    const at = new Date().toISOString();
    const filePath = path.join(
      this.interactionLogDir,
      `${at.slice(0, 10)}_${this.interactionType}.jsonl`
    );
    const record = {
      at,
      type: this.interactionType,
      model: this.model,
      systemPrompt,
      userPrompt,
      response,
      totalTokens: usage?.total_tokens ?? null,
    };

    try {
      await fs.promises.mkdir(this.interactionLogDir, { recursive: true });
      await fs.promises.appendFile(filePath, JSON.stringify(record) + "\n", "utf-8");
    } catch (error) {
      logger.error(`Failed to save LLM interaction log: ${describeError(error)}`);
    }
  }
}
