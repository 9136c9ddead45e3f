import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createProvider } from "./providers/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: resolve(__dirname, "../../../.env") });
dotenv.config();

const logger = createLogger();

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.fatal({ err: error }, "startup aborted");
  process.exit(1);
}

const app = createApp({ provider: createProvider(config), logger });

app.listen(config.port, () => {
  logger.info({ model: config.model }, `Textkit backend listening on http://localhost:${config.port}`);
});
