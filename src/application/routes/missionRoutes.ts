import { Router, type Request, type Response } from "express";
import { container } from "@/config/container";
import { TYPES } from "@/config/Types";
import { MissionController } from "@/infrastructure/controllers/missionController";

const router = Router();
const missionController = container.get<MissionController>(
  TYPES.MissionController,
);

/**
 * Liveness probe with the current tick.
 */
router.get("/health", (req: Request, res: Response): void => {
  missionController.health(req, res);
});

/**
 * Dashboard view: grid, robot, orders, plan, sequence, countdown and metrics.
 */
router.get("/api/state", (req: Request, res: Response): void => {
  missionController.getState(req, res);
});

router.get("/api/metrics", (req: Request, res: Response): void => {
  missionController.getMetrics(req, res);
});

/**
 * Queues a delivery to the house at `{ x, y }`.
 *
 * @returns 202 with the allocated order id, 400 when the cell is not a house
 */
router.post("/api/orders", (req: Request, res: Response): void => {
  missionController.addOrder(req, res);
});

/**
 * Flips the free/obstacle terrain of `{ x, y }`.
 *
 * @returns 200 with the new terrain, 400 for protected or out-of-bounds cells
 */
router.post("/api/obstacles/toggle", (req: Request, res: Response): void => {
  missionController.toggleObstacle(req, res);
});

router.post("/api/system/reset", (req: Request, res: Response): void => {
  missionController.reset(req, res);
});

/**
 * Recent in-memory log entries.
 * Query: `level`, `category` (comma separated), `sinceTick`, `contains`, `limit`.
 */
router.get("/api/logs", (req: Request, res: Response): void => {
  missionController.getLogs(req, res);
});

export default router;
