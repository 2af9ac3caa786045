import { appConfig } from "./config.js";
import { checkDependencies } from "./runtime/connectivity.js";
import { createRagRuntime } from "./runtime/ragRuntime.js";
import { createApp } from "./server.js";
import { logger } from "./utils/logger.js";

const runtime = createRagRuntime(appConfig);

const checks = checkDependencies(runtime);
if (checks.llm === "not_configured" || checks.vectorDb === "not_configured") {
  logger.warn({ checks }, "Providers missing configuration, chat answers will degrade");
}

createApp(runtime).listen(appConfig.PORT, () => {
  logger.info(`RegIntel backend is running on http://localhost:${appConfig.PORT}`);
});
