// Load environment variables first before any other imports
import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { loadConfig } from "./config/unified-config";
import { logger } from "./config/logger";
import { JsonFileProfileSource } from "./services/profile-dataset";

function main(): void {
  const config = loadConfig();
  const profileSource = new JsonFileProfileSource(config.matching.profilesPath);
  const app = createApp({ config, profileSource });

  const server = app.listen(config.port, config.host, () => {
    logger.info(
      { port: config.port, host: config.host, env: config.env, profiles: profileSource.description },
      "Matching service listening",
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "Error while closing HTTP server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

try {
  main();
} catch (error) {
  logger.fatal({ err: error }, "Failed to start matching service");
  process.exit(1);
}
