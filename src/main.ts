import { logger } from "./utils/logger";
import { errorMessage } from "./utils/errors";
import { AppConfig, validateConfig } from "./configs/environment";
import { loadStaticData, StaticData } from "./loaders/catalogLoader";
import { createCompletionClient } from "./services/completion";
import { ExerciseCatalogService } from "./services/exerciseCatalog.service";
import {
  ExerciseSamplerService,
  RandomSource,
} from "./services/exerciseSampler.service";
import { SportDetectorService } from "./services/sportDetector.service";
import { GamePlanService } from "./services/gamePlan.service";
import { CompletionClient } from "./types/model/completion.model";

export interface GamePlanDependencies {
  staticData?: StaticData;
  completionClient?: CompletionClient;
  random?: RandomSource;
}

/**
 * Wires the catalog, detector, sampler and completion client. The static
 * data is loaded once here and shared read-only by every request.
 */
export function buildGamePlanService(
  config: AppConfig,
  deps: GamePlanDependencies = {}
): GamePlanService {
  const { catalog, sportKeywords } = deps.staticData ?? loadStaticData();
  const catalogService = new ExerciseCatalogService(catalog);

  return new GamePlanService(
    catalogService,
    new SportDetectorService(sportKeywords),
    new ExerciseSamplerService(catalogService, deps.random),
    deps.completionClient ?? createCompletionClient(config.llm),
    { sportDetection: config.features.sportDetection }
  );
}

class GamePlanApplication {
  /**
   * Validates the environment and builds the service. A missing credential
   * stops the process before anything is served.
   */
  initialize(): { config: AppConfig; gamePlanService: GamePlanService } {
    logger.info("Starting GamePlan ...");
    try {
      const config = validateConfig();
      const gamePlanService = buildGamePlanService(config);
      logger.info(
        `Completion provider: ${gamePlanService.provider} (${gamePlanService.model})`
      );
      if (!config.features.sportDetection) {
        logger.info("Sport detection disabled; sampling uses the focus area only");
      }
      logger.info("GamePlan ready!");
      return { config, gamePlanService };
    } catch (error) {
      logger.error(`Failed to initialize application: ${errorMessage(error)}`);
      process.exit(1);
    }
  }
}

export { GamePlanApplication };
