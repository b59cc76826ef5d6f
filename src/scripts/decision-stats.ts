import { ConfigLoader } from "../config/config";
import { TradeDecisionRepository } from "../store/trade-decision-repository";
import { formatDecisionStats, summarizeDecisions } from "../reporting/decision-stats";
import { logger } from "../utils/logger";

// Usage: npm run stats -- [COIN]
function main() {
  const config = ConfigLoader.getInstance();
  const coinName = process.argv[2];

  const repository = new TradeDecisionRepository(config.database.path);
  try {
    repository.initialize();
    const records = repository.getAllDecisions(coinName);

    logger.info(`Decision statistics${coinName ? ` for ${coinName}` : ""}:`);
    formatDecisionStats(summarizeDecisions(records)).forEach(line => logger.info(line));
  } catch (error) {
    logger.error("Failed to compute decision statistics:", error);
    process.exitCode = 1;
  } finally {
    repository.close();
  }
}

main();
