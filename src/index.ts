import { loadConfig } from "./config/config.js";
import { ScannerBot } from "./bots/scannerBot.js";
import { logger } from "./utils/logger.js";

const configPath = process.env.CONFIG_PATH;
const config = loadConfig(configPath);

const bot = new ScannerBot(config);

const shutdown = (signal: string) => {
  logger.info({ signal }, "Shutting down");
  bot
    .stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

bot.start().catch((err: unknown) => {
  logger.fatal({ err }, "Scanner failed to start");
  process.exit(1);
});
