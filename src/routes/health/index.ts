import express from "express";
import { GamePlanService } from "../../services/gamePlan.service";

export const createHealthRouter = (gamePlanService: GamePlanService) => {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "GamePlan API is healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || "development",
    });
  });

  healthRouter.get("/status", (_req, res) => {
    res.json({
      success: true,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: {
        completion: {
          provider: gamePlanService.provider,
          model: gamePlanService.model,
        },
        gameplan: "active",
      },
      endpoints: {
        options: "/api/v1/gameplan/options",
        generate: "/api/v1/gameplan/generate",
        preview: "/api/v1/gameplan/preview",
      },
    });
  });

  return healthRouter;
};
