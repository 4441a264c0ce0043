import { loadEnvConfig } from "./config/env";
import { logger } from "./config/logger";
import { createPool, testConnection, closePool } from "./config/database";
import { createContext } from "./context";
import { createApp } from "./app";

async function start(): Promise<void> {
  const config = loadEnvConfig();
  logger.setLevel(config.LOG_LEVEL);
  const pool = createPool(config);

  logger.info("server", "Testing database connection...");
  if (await testConnection(pool)) {
    logger.info("server", "Database connection successful.");
  } else {
    logger.warn("server", "Database connection failed. Server will start but requests touching the DB will fail.");
  }

  const app = createApp(createContext(config, pool));

  const server = app.listen(config.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${config.PORT}`, {
      port: config.PORT,
      nodeEnv: config.NODE_ENV,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      closePool(pool)
        .then(() => {
          logger.info("server", "Server shut down.");
          process.exit(0);
        })
        .catch((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          logger.error("server", "Failed to close connection pool", { error: message });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.error("server", "Failed to start", { error: message });
  process.exit(1);
});
