import dotenv from "dotenv";
import fs from "fs";
import toml from "@iarna/toml";
import path from "path";
import { z } from "zod";
import { logger } from "../utils/logger";

// 立即加载环境变量
dotenv.config();

const marketSchema = z
  .object({
    quote_currency: z.string().min(1).default("KRW"),
    max_lookback_candles: z.number().int().positive().default(200),
  })
  .default({});

const reflectionSchema = z
  .object({
    horizon_hours: z.number().int().positive().default(24),
    min_hours_old: z.number().nonnegative().default(24),
    preview_points: z.number().int().nonnegative().default(5),
    min_recommended_hours: z.number().int().nonnegative().default(12),
  })
  .default({});

const llmSchema = z
  .object({
    log_interactions: z.boolean().default(false),
    timeout_ms: z.number().int().positive().default(60_000),
    max_retries: z.number().int().nonnegative().default(2),
  })
  .default({});

const databaseSchema = z
  .object({
    path: z.string().min(1).default("database/trade_log.db"),
  })
  .default({});

const reportSchema = z
  .object({
    render_chart: z.boolean().default(true),
    output_dir: z.string().min(1).default("output/reflection"),
  })
  .default({});

const tomlSchema = z.object({
  market: marketSchema,
  reflection: reflectionSchema,
  llm: llmSchema,
  database: databaseSchema,
  report: reportSchema,
});

export type TomlConfig = z.infer<typeof tomlSchema>;
export type MarketConfig = TomlConfig["market"];
export type ReflectionConfig = TomlConfig["reflection"];
export type DatabaseConfig = TomlConfig["database"];
export type ReportConfig = TomlConfig["report"];

export interface AppConfig {
  // Environment Variables
  exchange: {
    id: string;
  };
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
    logInteractions: boolean;
    timeoutMs: number;
    maxRetries: number;
  };

  // TOML Config
  market: MarketConfig;
  reflection: ReflectionConfig;
  database: DatabaseConfig;
  report: ReportConfig;
}

/**
 * Merge the parsed config.toml contents with environment variables.
 * Throws a ZodError when a TOML value has the wrong type.
 */
export function parseConfig(
  rawToml: unknown,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const tomlConfig = tomlSchema.parse(rawToml ?? {});

  return {
    exchange: {
      id: env.EXCHANGE_ID || "upbit",
    },
    llm: {
      apiKey: env.LLM_API_KEY || "",
      baseUrl: env.LLM_BASE_URL || "https://api.openai.com/v1",
      model: env.LLM_MODEL || "gpt-4o-2024-08-06",
      logInteractions: tomlConfig.llm.log_interactions,
      timeoutMs: tomlConfig.llm.timeout_ms,
      maxRetries: tomlConfig.llm.max_retries,
    },
    market: tomlConfig.market,
    reflection: tomlConfig.reflection,
    database: {
      path: env.DB_PATH || tomlConfig.database.path,
    },
    report: tomlConfig.report,
  };
}

export class ConfigLoader {
  private static instance: AppConfig | undefined;

  private constructor() {}

  public static getInstance(): AppConfig {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = ConfigLoader.loadConfig();
    }
    return ConfigLoader.instance;
  }

  private static loadConfig(): AppConfig {
    const configPath = path.resolve(process.cwd(), "config.toml");

    if (!fs.existsSync(configPath)) {
      logger.warn(`config.toml not found at ${configPath}, using defaults.`);
      return parseConfig({});
    }

    const fileContent = fs.readFileSync(configPath, "utf-8");
    return parseConfig(toml.parse(fileContent));
  }
}
