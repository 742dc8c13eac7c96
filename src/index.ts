import "dotenv/config";

import { createApiServer } from "./api";
import { loadConfig, type AppConfig } from "./config";
import { normalizeError } from "./errors";
import { AppLogger } from "./logger";
import { RaffleRepository } from "./repository";
import { createRaffleService } from "./service";

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    // Config errors should fail fast before runtime starts.
    console.error("config_load_failed", normalizeError(error));
    process.exit(1);
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  const logger = new AppLogger({ logPath: config.logPath });
  const repository = new RaffleRepository(config.storagePath);
  const service = createRaffleService(config, logger, repository);
  const apiServer = createApiServer(config, service, logger);
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown_started", { reason, exitCode });

    service.stop();
    try {
      service.persist();
    } catch (error) {
      logger.error("final_persist_failed", normalizeError(error));
    }

    if (!apiServer) {
      logger.info("shutdown_completed", { reason, exitCode });
      process.exit(exitCode);
    }

    const forceExit = setTimeout(() => {
      logger.error("shutdown_forced_exit", { reason });
      process.exit(exitCode);
    }, 5000);
    forceExit.unref();

    apiServer.close(() => {
      clearTimeout(forceExit);
      logger.info("shutdown_completed", { reason, exitCode });
      process.exit(exitCode);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (error) => {
    logger.error("uncaught_exception", normalizeError(error));
    shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("unhandled_rejection", normalizeError(reason));
    shutdown("unhandledRejection", 1);
  });

  service.keeper.start();
  logger.info("raffle_started", {
    storagePath: config.storagePath,
    entranceFee: config.raffle.entranceFee,
    intervalMs: config.raffle.intervalMs,
    roundState: service.raffle.getRoundState(),
  });
}

main();
