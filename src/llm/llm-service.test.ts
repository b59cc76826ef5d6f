import { describe, it, expect, vi, beforeEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { LLMService } from "./llm-service";

const { create, list } = vi.hoisted(() => ({
  create: vi.fn(),
  list: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create } };
    models = { list };
  },
}));

const llmConfig = {
  apiKey: "test-secret",
  baseUrl: "http://localhost:0/v1",
  model: "test-model",
  logInteractions: false,
  timeoutMs: 1000,
  maxRetries: 0,
};

describe("LLMService", () => {
  beforeEach(() => {
    create.mockReset();
    list.mockReset();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("requests a JSON object reply and returns its content", async () => {
    create.mockResolvedValue({
      choices: [{ message: { content: '{"reflection":"fine"}' } }],
      usage: { prompt_tokens: 1200, completion_tokens: 300, total_tokens: 1500 },
    });

    const reply = await new LLMService(llmConfig).completeJson("system", "user");

    expect(reply).toBe('{"reflection":"fine"}');
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: "system" },
        { role: "user", content: "user" },
      ],
      response_format: { type: "json_object" },
    });
  });

  it("throws on an empty reply", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: null } }] });

    await expect(new LLMService(llmConfig).completeJson("system", "user")).rejects.toThrow(
      "LLM returned an empty response"
    );
  });

  it("reports a failed connection check as false", async () => {
    list.mockRejectedValue(new Error("401 Unauthorized"));

    await expect(new LLMService(llmConfig).testConnection()).resolves.toBe(false);
  });

  it("appends one JSON line per exchange when interaction logging is on", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-interactions-"));
    create.mockResolvedValue({
      choices: [{ message: { content: '{"reflection":"fine"}' } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
    const service = new LLMService({ ...llmConfig, logInteractions: true }, "REFLECTION", dir);

    await service.completeJson("system", "first");
    await service.completeJson("system", "second");

    const files = fs.readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^\d{4}-\d{2}-\d{2}_REFLECTION\.jsonl$/);
    const lines = fs.readFileSync(path.join(dir, files[0]), "utf-8").trim().split("\n");
    expect(lines.map(line => JSON.parse(line).userPrompt)).toEqual(["first", "second"]);
    expect(JSON.parse(lines[0])).toMatchObject({
      type: "REFLECTION",
      model: "test-model",
      systemPrompt: "system",
      response: '{"reflection":"fine"}',
      totalTokens: 15,
    });
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
