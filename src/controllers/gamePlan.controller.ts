import { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { MESSAGES } from "../utils/constants";
import { CompletionError, EmptyRequestError } from "../utils/errors";
import { sendError, sendSuccess } from "../utils/response";
import { UserProfile } from "../types/model/userProfile.model";
import { GamePlanService } from "../services/gamePlan.service";

export class GamePlanController {
  constructor(private readonly gamePlanService: GamePlanService) {}

  /**
   * @route POST /api/v1/gameplan/generate
   * @desc Generate a workout plan from the training profile
   */
  async generate(req: Request, res: Response, next: NextFunction): Promise<void> {
    const profile: UserProfile = req.body;
    try {
      logger.info(
        `[Controller] - Generating GamePlan: ${profile.request.substring(0, 100)}`
      );
      const gamePlan = await this.gamePlanService.generate(profile);
      sendSuccess(res, "Your GamePlan is ready", gamePlan, 201);
    } catch (error) {
      this.handleError(error, res, next);
    }
  }

  /**
   * @route POST /api/v1/gameplan/preview
   * @desc Show the prompt that would be sent, without calling the model
   */
  preview(req: Request, res: Response, next: NextFunction): void {
    const profile: UserProfile = req.body;
    try {
      const preview = this.gamePlanService.preview(profile);
      sendSuccess(res, "GamePlan prompt preview", preview);
    } catch (error) {
      this.handleError(error, res, next);
    }
  }

  /**
   * @route GET /api/v1/gameplan/options
   * @desc Form inputs, their options and defaults
   */
  getOptions(_req: Request, res: Response): void {
    sendSuccess(res, "Form options retrieved", this.gamePlanService.getFormOptions());
  }

  private handleError(error: unknown, res: Response, next: NextFunction): void {
    if (error instanceof EmptyRequestError) {
      logger.warn(`[Controller] - ${error.message}`);
      sendError(res, error.message, error.status);
      return;
    }
    if (error instanceof CompletionError) {
      logger.error(
        `GamePlan generation error (${error.provider ?? "unknown provider"}): ${error.message}`
      );
      sendError(res, `${MESSAGES.GENERATION_FAILED}: ${error.message}`, error.status);
      return;
    }
    next(error);
  }
}
