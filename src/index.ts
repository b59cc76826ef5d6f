import path from "path";
import { ConfigLoader } from "./config/config";
import { ExchangeManager } from "./market/exchange-manager";
import { MarketDataManager } from "./market/manager";
import { LLMService } from "./llm/llm-service";
import { PriceWindowFetcher } from "./reflection/price-window";
import { ReflectionGenerator } from "./reflection/reflection-generator";
import { ReflectionPipeline, formatSummary } from "./reflection/pipeline";
import { TradeDecisionRepository } from "./store/trade-decision-repository";
import { tryRenderOutcomeReport } from "./reporting/outcome-report";
import { logger } from "./utils/logger";

async function main() {
  logger.info("=".repeat(60));
  logger.info("Trading Decision Reflection Generator");
  logger.info("=".repeat(60));

  try {
    const config = ConfigLoader.getInstance();
    logger.info(`Loaded config:`);
    logger.info(`- Exchange: ${config.exchange.id} (${config.market.quote_currency} markets)`);
    logger.info(`- LLM: ${config.llm.model} @ ${config.llm.baseUrl}`);
    logger.info(`- Database: ${config.database.path}`);
    logger.info(
      `- Window: ${config.reflection.horizon_hours}h after trade, trades ${config.reflection.min_hours_old}h+ old`
    );

    const repository = new TradeDecisionRepository(config.database.path);
    repository.initialize();

    try {
      const exchangeManager = new ExchangeManager(config.exchange.id);
      const priceWindows = new PriceWindowFetcher(
        new MarketDataManager(exchangeManager.getExchange()),
        {
          quoteCurrency: config.market.quote_currency,
          maxLookbackCandles: config.market.max_lookback_candles,
        }
      );
      const generator = new ReflectionGenerator(new LLMService(config.llm), {
        quoteCurrency: config.market.quote_currency,
        previewPoints: config.reflection.preview_points,
        timeoutMs: config.llm.timeoutMs,
      });

      const pipeline = new ReflectionPipeline({
        store: repository,
        priceWindows,
        generator,
        quoteCurrency: config.market.quote_currency,
        minRecommendedHours: config.reflection.min_recommended_hours,
      });

      const summary = await pipeline.run({
        minHoursOld: config.reflection.min_hours_old,
        horizonHours: config.reflection.horizon_hours,
      });

      formatSummary(summary).forEach(line => logger.info(line));

      if (config.report.render_chart && summary.processed > 0) {
        tryRenderOutcomeReport(
          repository.getAllDecisions(),
          path.resolve(process.cwd(), config.report.output_dir)
        );
      }
    } finally {
      repository.close();
    }

    logger.info("=".repeat(60));
    logger.info("✓ Reflection generation complete!");
    logger.info("=".repeat(60));
  } catch (error) {
    logger.error("Fatal error during reflection run:", error);
    process.exit(1);
  }
}

void main();
