import express from "express";
import { GamePlanController } from "../controllers/gamePlan.controller";
import { GamePlanService } from "../services/gamePlan.service";
import { createGamePlanRouter } from "./gameplan";
import { createHealthRouter } from "./health";

export const createRoutes = (gamePlanService: GamePlanService) => {
  const router = express.Router();
  const healthRoute = createHealthRouter(gamePlanService);

  router.use("/health", healthRoute);
  router.use("/api/health", healthRoute);

  router.use(
    "/api/v1/gameplan",
    createGamePlanRouter(new GamePlanController(gamePlanService))
  );

  return router;
};
