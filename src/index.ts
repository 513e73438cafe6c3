/**
 * Process entry point: builds the container, serves the management API,
 * tails the firehose and shuts everything down in order on SIGINT/SIGTERM.
 *
 * A firehose that stays unreachable past its retry budget ends the process
 * with exit code 1.
 */

import { Server } from "http";
import { env } from "./config/env";
import { buildContainer } from "./container";
import { createApp } from "./infrastructure/http/app";
import { logger } from "./infrastructure/logger";

function closeServer(server: Server, graceMs: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      server.closeAllConnections();
      resolve();
    }, graceMs);
    server.close(() => {
      clearTimeout(timer);
      resolve();
    });
    server.closeIdleConnections();
  });
}

const bootstrap = async () => {
  const container = await buildContainer(env);
  const app = createApp(container.app);

  const server = app.listen(env.PORT, () => {
    logger.info({
      type: "SERVER_START",
      message: "HTTP server listening",
      payload: { port: env.PORT, store: env.STORE_DRIVER, messaging: env.MESSAGING_DRIVER },
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({
      type: "SHUTDOWN",
      message: `Received ${signal}, shutting down`,
      payload: { graceMs: env.SHUTDOWN_GRACE_MS },
    });

    try {
      await closeServer(server, env.SHUTDOWN_GRACE_MS);
      await container.firehose.stop(env.SHUTDOWN_GRACE_MS);
      await container.messaging.close(env.SHUTDOWN_GRACE_MS);
      await container.close();
    } catch (error) {
      logger.error({ type: "SHUTDOWN_ERROR", message: "Error during shutdown", error });
      exitCode = exitCode || 1;
    }

    process.exit(exitCode);
  };

  process.on("SIGINT", () => void shutdown("SIGINT", 0));
  process.on("SIGTERM", () => void shutdown("SIGTERM", 0));

  if (env.FIREHOSE_ENABLED) {
    container.firehose.run().then(
      () => logger.info({ type: "FIREHOSE_STOPPED", message: "Firehose consumer stopped" }),
      (error: unknown) => {
        logger.error({ type: "FIREHOSE_FATAL", message: "Firehose connection lost for good", error });
        void shutdown("firehose failure", 1);
      }
    );
  } else {
    logger.warn({ type: "FIREHOSE_DISABLED", message: "FIREHOSE_ENABLED=false, not tailing the firehose" });
  }
};

bootstrap().catch((error: unknown) => {
  logger.error({ type: "BOOTSTRAP_FAILED", message: "Failed to start", error });
  process.exit(1);
});
