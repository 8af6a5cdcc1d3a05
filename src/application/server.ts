import "dotenv/config";
import "reflect-metadata";
import app from "./app";
import { CONFIG } from "../config/config";
import { container } from "../config/container";
import { TYPES } from "../config/Types";
import { MapeLoopRunner } from "../domain/simulation/core/MapeLoopRunner";
import { MissionStreamServer } from "../infrastructure/services/stream/MissionStreamServer";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";

/**
 * Main server entry point.
 *
 * Initializes the MAPE-K loop, serves the HTTP API and upgrades
 * `/ws/mission` to the dashboard stream.
 *
 * @module application
 */

const runner = container.get<MapeLoopRunner>(TYPES.MapeLoopRunner);

logger.setLevel(CONFIG.LOG.LEVEL);
logger.info("🚀 Backend: Starting mission loop...", LogCategory.LOOP);

runner.initialize();
const missionStream = new MissionStreamServer(runner);

const server = app.listen(CONFIG.PORT, CONFIG.HOST, () => {
  logger.info(
    `Mission server running on http://${CONFIG.HOST}:${CONFIG.PORT}`,
    LogCategory.TRANSPORT,
    {
      grid: `${CONFIG.GRID.WIDTH}x${CONFIG.GRID.HEIGHT}`,
      base: CONFIG.GRID.BASE,
      capacity: CONFIG.ROBOT.CAPACITY,
    },
  );
  runner.start();
});

server.on("upgrade", (request, socket, head) => {
  const host = request.headers.host ?? "localhost";
  const url = request.url ?? "/";
  let pathname: string;
  try {
    pathname = new URL(url, `http://${host}`).pathname;
  } catch (error) {
    logger.debug("Invalid URL in WebSocket upgrade request", LogCategory.TRANSPORT, {
      url,
      host,
      error: error instanceof Error ? error.message : String(error),
    });
    socket.destroy();
    return;
  }

  if (pathname === "/ws/mission") {
    missionStream.handleUpgrade(request, socket, head);
    return;
  }

  socket.destroy();
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`, LogCategory.LOOP);

  runner.dispose();
  await missionStream.close();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  await logger.destroy();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", LogCategory.LOOP, {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
}
