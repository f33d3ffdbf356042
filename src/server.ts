import "dotenv/config";
import { createApp } from "./app.js";
import { ChatInvoker } from "./chat.js";
import { createClient, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);
const invoker = new ChatInvoker({ client: createClient(config), defaultModel: config.model, logger });

createApp({ invoker, logger }).listen(config.port, () =>
    logger.info(`API listening on http://localhost:${config.port} (model ${config.model} at ${config.baseURL})`)
);
