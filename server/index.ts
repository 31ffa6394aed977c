import { createApp } from "./app";
import { ConfigError, loadConfig } from "./config";
import { closeDatabase, createDatabase, probeDatabase } from "./db";
import { EmailService } from "./emailService";
import { logError, logger } from "./logger";
import { setupGracefulShutdown } from "./middleware/gracefulShutdown";
import { createHttpServer } from "./routes";
import { createRepositories } from "./storage";

process.on("unhandledRejection", (reason) => {
  logger.error("[Server] Unhandled rejection", { reason });
});

process.on("uncaughtException", (error) => {
  logError(error, { source: "uncaughtException" });
});

async function main(): Promise<void> {
  const config = loadConfig(process.env, { requireRuntime: true });
  if (!config.databaseUrl || !config.authTokenSecret) {
    throw new ConfigError(["DATABASE_URL and AUTH_TOKEN_SECRET must be set"]);
  }
  const databaseUrl = config.databaseUrl;

  const database = createDatabase(databaseUrl);
  await probeDatabase(database, databaseUrl);

  const { app, services } = createApp({
    repositories: createRepositories(database.db),
    dispatcher: new EmailService(config.email),
    authTokenSecret: config.authTokenSecret,
    quoteValidityDays: config.quoteValidityDays,
    notificationConcurrency: config.notificationConcurrency,
    readinessProbe: () => probeDatabase(database, databaseUrl),
  });

  const server = createHttpServer(app);

  setupGracefulShutdown(server, {
    drainNotifications: () => services.notifications.onIdle(),
    closeDatabase: () => closeDatabase(database),
  });

  server.on("error", (error) => {
    logger.error("[Server] Error", { error });
    process.exit(1);
  });

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info(`[Server] serving on port ${config.port}`, { nodeEnv: config.nodeEnv });
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message, { problems: error.problems });
  } else {
    logError(error, { source: "startup" });
  }
  process.exit(1);
});
