import express from "express";
import { GamePlanController } from "../../controllers/gamePlan.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { generateGamePlanSchema } from "../../validators/gamePlan.validator";

export const createGamePlanRouter = (controller: GamePlanController) => {
  const router = express.Router();

  /**
   * @route GET /api/v1/gameplan/options
   * @desc Form inputs with their options and defaults
   * @access Public
   */
  router.get("/options", (req, res) => controller.getOptions(req, res));

  /**
   * @route POST /api/v1/gameplan/generate
   * @desc Generate a workout plan
   * @access Public
   */
  router.post(
    "/generate",
    validateContentType,
    validateRequest(generateGamePlanSchema),
    (req, res, next) => controller.generate(req, res, next)
  );

  /**
   * @route POST /api/v1/gameplan/preview
   * @desc Build the prompt without calling the completion service
   * @access Public
   */
  router.post(
    "/preview",
    validateContentType,
    validateRequest(generateGamePlanSchema),
    (req, res, next) => controller.preview(req, res, next)
  );

  return router;
};
