import express, {
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import missionRoutes from "./routes/missionRoutes";
import metricsRoutes from "./routes/metricsRoutes";
import { CONFIG } from "../config/config";
import { logger } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import { LogCategory } from "../shared/constants/LogEnums";
import { ResponseStatus } from "../shared/constants/ResponseEnums";

/**
 * Express application instance.
 *
 * Routes:
 * - `/health` - Liveness probe
 * - `/api/state`, `/api/metrics`, `/api/logs` - Dashboard reads
 * - `/api/orders`, `/api/obstacles/toggle`, `/api/system/reset` - User commands
 * - `/metrics` - Prometheus exposition
 *
 * @module application
 */
const app = express();

app.use(
  cors({
    origin: CONFIG.CORS_ORIGIN,
  }),
);

app.use(express.json({ limit: "1mb" }));

if (process.env.NODE_ENV !== "production") {
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, LogCategory.TRANSPORT);
    next();
  });
}

app.use("/", missionRoutes);
app.use("/", metricsRoutes);

app.use(
  (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if ("status" in err && err.status === HttpStatusCode.BAD_REQUEST) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ status: ResponseStatus.ERROR, error: "Malformed request body" });
      return;
    }
    const errorMessage =
      process.env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message;
    logger.error("Unhandled error", LogCategory.TRANSPORT, {
      error: err.message,
    });
    res
      .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
      .json({ status: ResponseStatus.ERROR, error: errorMessage });
  },
);

app.use((_req: Request, res: Response): void => {
  res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
});

export default app;
