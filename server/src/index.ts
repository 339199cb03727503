import { createApp } from "./app";
import { loadConfig } from "./config";
import { createFileDataStore } from "./dataStore";
import { logger, setLogLevel } from "./logger";

export { createApp } from "./app";
export { FastingService } from "./fastingService";
export { createFileDataStore } from "./dataStore";

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const store = createFileDataStore(config.dataDir);
  const { app, registry } = createApp({ config, repository: store, keyValueStore: store.keyValueStore, notificationStore: store });

  await registry.get(config.defaultUserId);
  const server = app.listen(config.port, () => logger.info(`Fasting regime server listening on http://localhost:${config.port} (data in ${store.dataDir})`));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    registry.disposeAll().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error("Failed to start server", error);
    process.exit(1);
  });
}
