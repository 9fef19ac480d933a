import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { isSuccess } from "@core/types";
import {
  IBrightnessController,
  IDisplayOrchestrator,
  IMatrixDriver,
  IPreviewServer,
} from "@core/interfaces";
import { SHUTDOWN_TIMEOUT_MS } from "@core/constants/defaults";
import { getLogger } from "@utils/logger";

const logger = getLogger("Main");

/**
 * Main Entry Point
 *
 * 1. Loads configuration
 * 2. Builds the configured modules and registers them for rotation
 * 3. Starts the preview server and auto-brightness
 * 4. Runs the display loop until a shutdown signal arrives
 */
async function main() {
  logger.info("🚀 Starting LED matrix display...\n");

  try {
    const container = ServiceContainer.getInstance();

    logger.info("Loading configuration...");
    const configService = container.getConfigService();
    const configResult = await configService.initialize();
    if (!isSuccess(configResult)) {
      logger.error("Invalid configuration:", configResult.error.message);
      process.exit(1);
    }
    logger.info("✓ Configuration loaded\n");

    logger.info("Registering modules...");
    const modulesResult = container.registerModules();
    if (!isSuccess(modulesResult)) {
      logger.error("Failed to register modules:", modulesResult.error.message);
      process.exit(1);
    }
    logger.info(`✓ Rotation: ${modulesResult.data.join(" → ")}\n`);

    const orchestrator = container.getDisplayOrchestrator();
    const driver = container.getMatrixDriver();

    let preview: IPreviewServer | null = null;
    if (configService.getPreviewConfig().enabled) {
      logger.info("Starting preview server...");
      preview = container.getPreviewServer();
      const previewResult = await preview.start();
      if (!isSuccess(previewResult)) {
        logger.warn("Preview not available:", previewResult.error.message);
        preview = null;
      } else {
        logger.info(`✓ Preview available at ${preview.getServerUrl()}\n`);
      }
    }

    const brightness = container.getBrightnessController();
    const brightnessResult = brightness.start();
    if (!isSuccess(brightnessResult)) {
      logger.warn("Auto-brightness not started:", brightnessResult.error.message);
    }

    setupGracefulShutdown(orchestrator, driver, brightness, preview);

    const { tickRateHz } = configService.getDisplayConfig();
    logger.info(`✅ Display loop running at ${tickRateHz} Hz\n`);
    const runResult = await orchestrator.run(tickRateHz);
    if (!isSuccess(runResult)) {
      logger.error("Display loop failed to start:", runResult.error.message);
      process.exit(1);
    }
  } catch (error) {
    logger.error("Fatal error during startup:", error);
    process.exit(1);
  }
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(
  orchestrator: IDisplayOrchestrator,
  driver: IMatrixDriver,
  brightness: IBrightnessController,
  preview: IPreviewServer | null,
): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`\n${signal} received. Shutting down...`);

    // Force exit if graceful shutdown hangs
    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      if (orchestrator.isRunning()) {
        logger.info("Stopping display loop...");
        orchestrator.stop();
      }

      brightness.stop();

      if (preview) {
        logger.info("Stopping preview server...");
        await preview.stop();
      }

      logger.info("Releasing matrix driver...");
      await driver.dispose();

      clearTimeout(forceExitTimeout);
      logger.info("✓ Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimeout);
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  // Handle shutdown signals
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  // Handle uncaught errors
  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
    shutdown("UNCAUGHT_EXCEPTION");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    shutdown("UNHANDLED_REJECTION");
  });
}

// Start the application
main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
