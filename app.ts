import "dotenv/config";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { logger } from "./src/utils/logger";
import { AppConfig } from "./src/configs/environment";
import {
  errorMiddleware,
  notFoundMiddleware,
} from "./src/middlewares/error.middleware";
import { createRateLimiter } from "./src/middlewares/validation.middleware";
import { GamePlanApplication } from "./src/main";
import { GamePlanService } from "./src/services/gamePlan.service";
import { createRoutes } from "./src/routes";

export const createApp = (config: AppConfig, gamePlanService: GamePlanService) => {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: config.api.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: "1mb" }));
  app.use(createRateLimiter(config.api.rateLimit));
  app.use(requestLogger);

  app.use("/", createRoutes(gamePlanService));

  app.use(notFoundMiddleware);
  // Error middleware should be last
  app.use(errorMiddleware);

  return app;
};

if (require.main === module) {
  const { config, gamePlanService } = new GamePlanApplication().initialize();
  const app = createApp(config, gamePlanService);
  app.listen(config.port, () =>
    logger.info(`GamePlan service started on port ${config.port}`)
  );
}
