import { Router } from "express";
import { container } from "../../config/container";
import { TYPES } from "../../config/Types";
import { MissionController } from "../../infrastructure/controllers/missionController";

const router = Router();
const missionController = container.get<MissionController>(
  TYPES.MissionController,
);

/**
 * Mission and loop metrics in Prometheus format.
 *
 * @returns Plain text in Prometheus format (version 0.0.4)
 */
router.get("/metrics", (req, res) => {
  missionController.prometheus(req, res);
});

export default router;
