import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const discoverySchema = z.object({
  searchQuery: z.string().min(1).default("solana"),
  chainId: z.string().min(1).default("solana"),
  minPairAgeMinutes: z.number().min(0).default(0.75),
  maxPairAgeMinutes: z.number().positive().default(15)
});

const filtersSchema = z.object({
  minLiquidityUsd: z.number().min(0).default(2_500),
  lowMarketCapUsd: z.number().min(0).default(6_000),
  highMarketCapUsd: z.number().min(0).default(150_000),
  highLiquidityUsd: z.number().min(0).default(150_000),
  minScoreToProceed: z.number().int().default(-1),
  maxBuyTaxPct: z.number().min(0).max(100).default(8),
  maxSellTaxPct: z.number().min(0).max(100).default(8),
  minHolders: z.number().int().min(0).default(20),
  softTopHolderPct: z.number().min(0).max(100).default(15),
  hardTopHolderPct: z.number().min(0).max(100).default(30)
});

const penaltiesSchema = z.object({
  lowMarketCap: z.number().int().max(0).default(-2),
  highMarketCap: z.number().int().max(0).default(-1),
  highLiquidity: z.number().int().max(0).default(-1),
  topHolder: z.number().int().max(0).default(-1)
});

const gradingSchema = z.object({
  mode: z.enum(["ai", "algorithmic"]).default("ai"),
  gradeCutoff: z.number().min(0).max(100).default(80),
  fallbackToAlgorithmic: z.boolean().default(false),
  apiKey: z.string().default(""),
  baseUrl: z.string().url().default("https://api.deepseek.com"),
  model: z.string().min(1).default("deepseek-chat"),
  timeoutMs: z.number().int().positive().default(20_000)
});

const securitySchema = z.object({
  apiKey: z.string().default(""),
  baseUrl: z.string().url().default("https://api.gopluslabs.io/api/v1"),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(2_000)
});

const observationSchema = z.object({
  durationSeconds: z.number().positive().default(60),
  pollIntervalSeconds: z.number().positive().default(10)
});

const tradeSchema = z.object({
  initialCapitalUsd: z.number().positive().default(200),
  maxOpenPositions: z.number().int().min(1).default(4),
  riskPerTrade: z.number().gt(0).max(1).default(0.05),
  trailingStopPct: z.number().gt(0).max(100).default(50),
  targetSellFraction: z.number().gt(0).max(1).default(0.7),
  ladderSellFraction: z.number().gt(0).max(1).default(0.5),
  ladderMultiplier: z.number().gt(1).default(2),
  defaultTargetMultiple: z.number().gt(1).default(10)
});

const telegramSchema = z.object({
  botToken: z.string().default(""),
  chatId: z.string().default("")
});

export const configSchema = z.object({
  scanIntervalSeconds: z.number().positive().default(10),
  discovery: discoverySchema.default({}),
  filters: filtersSchema.default({}),
  penalties: penaltiesSchema.default({}),
  grading: gradingSchema.default({}),
  security: securitySchema.default({}),
  observation: observationSchema.default({}),
  trade: tradeSchema.default({}),
  telegram: telegramSchema.default({})
});

export type BotConfig = z.infer<typeof configSchema>;
export type TradeConfig = BotConfig["trade"];

const defaultConfigPath = path.resolve("config", "config.json");

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === "object") {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
};

/**
 * Validates a raw config object, fills defaults and applies secrets from the
 * environment. The result is frozen: components read it, never write it.
 */
export const parseConfig = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Readonly<BotConfig> => {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid config: ${issues.join("; ")}`);
  }
  const config = result.data;
  config.telegram.botToken = env.TELEGRAM_BOT_TOKEN ?? config.telegram.botToken;
  config.telegram.chatId = env.TELEGRAM_CHAT_ID ?? config.telegram.chatId;
  config.grading.apiKey = env.GRADING_API_KEY ?? config.grading.apiKey;
  config.security.apiKey = env.GOPLUS_API_KEY ?? config.security.apiKey;
  if (config.filters.softTopHolderPct > config.filters.hardTopHolderPct) {
    throw new Error("Invalid config: filters.softTopHolderPct must not exceed filters.hardTopHolderPct");
  }
  return deepFreeze(config);
};

export const loadConfig = (configPath = defaultConfigPath): Readonly<BotConfig> => {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Config file not found at ${resolved}`);
  }
  const raw = fs.readFileSync(resolved, "utf-8");
  return parseConfig(JSON.parse(raw));
};
