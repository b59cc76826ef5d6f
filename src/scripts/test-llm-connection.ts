import { ConfigLoader } from "../config/config";
import { LLMService } from "../llm/llm-service";
import { logger } from "../utils/logger";

async function testConnection() {
  const config = ConfigLoader.getInstance();
  const service = new LLMService(config.llm, "CONNECTION_TEST");

  const ok = await service.testConnection();
  if (!ok) {
    process.exitCode = 1;
    return;
  }

  logger.info("Sending a JSON round-trip request to the LLM...");
  try {
    const reply = await service.completeJson(
      'Reply with a JSON object of the form {"reflection": string}.',
      'Return {"reflection": "pong"} as JSON.'
    );
    logger.info(`LLM response received: ${reply}`);
  } catch (error) {
    logger.error("LLM request failed:", error);
    process.exitCode = 1;
  }
}

void testConnection();
