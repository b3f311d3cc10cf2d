import { createApp } from "./app";
import { config } from "./config";
import { logger } from "./lib/logger";

const app = createApp();

app.listen(config.port, config.host, () => {
    logger.info({ port: config.port, host: config.host }, `API running on port ${config.port} (${config.host})`);
});
