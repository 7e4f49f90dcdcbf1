import { getLogger } from "@ocr-layout/core";
import { createApp } from "./app";
import { loadEnv, readConfig } from "./config";

loadEnv();

const config = readConfig();
const logger = getLogger("api");

createApp(config, logger).listen(config.port, () => {
  logger.info("api.listen", { port: config.port, body_limit: config.bodyLimit });
});
