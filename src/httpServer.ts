import "dotenv/config";
import { loadConfig } from "./config.js";
import { createLogger } from "./logging.js";
import { createTimerServer } from "./server.js";
import { TimerFileStorage } from "./state/timerStorage.js";
import { TimerStore } from "./state/timerStore.js";

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger("timers", config.logLevel);
  if (config.apiTokens.size === 0) {
    logger.warn("API_TOKENS is empty; every /timers request will be rejected.");
  }

  const storage = new TimerFileStorage(config.dataFile);
  const store = new TimerStore({
    initialTimers: await storage.load(),
    onChange: timers => storage.save(timers),
    logger: logger.child("store")
  });

  const { app, abortPendingPolls } = createTimerServer({ config, records: store, logger });

  const serverInstance = app.listen(config.port, () => {
    logger.info(`Timer HTTP server listening on port ${config.port}`);
  });

  const shutdown = async () => {
    logger.info("Shutting down timer server...");
    abortPendingPolls();
    serverInstance.close();
    serverInstance.closeAllConnections();
    try {
      await store.waitForPersistence();
    } catch (error) {
      logger.error("Failed to flush timers before exit", { error });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

bootstrap().catch(error => {
  console.error("Failed to start timer HTTP server", error);
  process.exit(1);
});
