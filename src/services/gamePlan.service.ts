import { v4 as uuidv4 } from "uuid";
import {
  ExperienceLevel,
  FocusArea,
  Mood,
  TrainingGoal,
} from "../common/common-enum";
import { logger } from "../utils/logger";
import {
  EXAMPLE_PROMPTS,
  FORM_DEFAULTS,
  GAMEPLAN_CONSTANTS,
  REQUEST_PLACEHOLDER,
} from "../utils/constants";
import { EmptyRequestError } from "../utils/errors";
import { UserProfile } from "../types/model/userProfile.model";
import { CompletionClient } from "../types/model/completion.model";
import {
  FormOptions,
  GamePlanPreview,
  GeneratedPlan,
  SamplingDecision,
} from "../types/model/gamePlan.model";
import { ExerciseCatalogService } from "./exerciseCatalog.service";
import { ExerciseSamplerService } from "./exerciseSampler.service";
import { SportDetectorService } from "./sportDetector.service";
import { buildPrompt } from "./promptBuilder.service";

export interface GamePlanServiceOptions {
  sportDetection: boolean;
}

/**
 * Runs one form submission end to end: sport detection, exercise sampling,
 * prompt assembly and the completion call.
 */
export class GamePlanService {
  constructor(
    private readonly catalog: ExerciseCatalogService,
    private readonly detector: SportDetectorService,
    private readonly sampler: ExerciseSamplerService,
    private readonly completionClient: CompletionClient,
    private readonly options: GamePlanServiceOptions = { sportDetection: true }
  ) {}

  get provider(): CompletionClient["provider"] {
    return this.completionClient.provider;
  }

  get model(): string {
    return this.completionClient.model;
  }

  /**
   * A detected sport is only used when the catalog has it; otherwise
   * sampling uses the focus area the user picked.
   */
  chooseSamplingLabel(detectedSport: string, focus: string): string {
    if (
      detectedSport !== GAMEPLAN_CONSTANTS.NO_SPORT &&
      this.catalog.has(detectedSport)
    ) {
      return detectedSport;
    }
    return this.catalog.resolveLabel(focus);
  }

  decide(profile: UserProfile): SamplingDecision {
    const detectedSport = this.options.sportDetection
      ? this.detector.detect(profile.request)
      : GAMEPLAN_CONSTANTS.NO_SPORT;
    const samplingLabel = this.chooseSamplingLabel(detectedSport, profile.focus);
    const suggestedExercises = this.sampler.sample(
      samplingLabel,
      GAMEPLAN_CONSTANTS.HINT_EXERCISE_COUNT
    );

    return { detectedSport, samplingLabel, suggestedExercises };
  }

  preview(profile: UserProfile): GamePlanPreview {
    this.assertRequest(profile);
    const decision = this.decide(profile);
    return {
      ...decision,
      prompt: buildPrompt(profile, decision.suggestedExercises),
    };
  }

  async generate(profile: UserProfile): Promise<GeneratedPlan> {
    const { prompt, ...decision } = this.preview(profile);

    logger.info(
      `[GamePlan] - ${profile.level}/${profile.focus}/${profile.minutes}min, sport=${decision.detectedSport}, label=${decision.samplingLabel}`
    );

    const startTime = Date.now();
    const result = await this.completionClient.complete({
      ...prompt,
      temperature: GAMEPLAN_CONSTANTS.TEMPERATURE,
      maxTokens: GAMEPLAN_CONSTANTS.MAX_TOKENS,
    });
    const generationTime = Date.now() - startTime;

    logger.info(`[GamePlan] - plan generated by ${result.model} in ${generationTime}ms`);

    return {
      id: uuidv4(),
      plan: result.text,
      provider: this.completionClient.provider,
      model: result.model,
      usage: result.usage,
      generationTime,
      ...decision,
    };
  }

  getFormOptions(): FormOptions {
    return {
      level: {
        name: "level",
        label: "Experience level",
        options: Object.values(ExperienceLevel),
        default: FORM_DEFAULTS.level,
      },
      goal: {
        name: "goal",
        label: "Main goal",
        options: Object.values(TrainingGoal),
        default: FORM_DEFAULTS.goal,
      },
      minutes: {
        name: "minutes",
        label: "Session length (minutes)",
        min: GAMEPLAN_CONSTANTS.MIN_SESSION_MINUTES,
        max: GAMEPLAN_CONSTANTS.MAX_SESSION_MINUTES,
        step: GAMEPLAN_CONSTANTS.SESSION_MINUTES_STEP,
        default: FORM_DEFAULTS.minutes,
      },
      mood: {
        name: "mood",
        label: "How are you feeling today?",
        options: Object.values(Mood),
        default: FORM_DEFAULTS.mood,
      },
      focus: {
        name: "focus",
        label: "Focus area",
        options: Object.values(FocusArea),
        default: FORM_DEFAULTS.focus,
      },
      request: {
        name: "request",
        label: "What kind of workout do you want today?",
        placeholder: REQUEST_PLACEHOLDER,
        examples: [...EXAMPLE_PROMPTS],
      },
    };
  }

  private assertRequest(profile: UserProfile): void {
    if (!profile.request.trim()) {
      throw new EmptyRequestError();
    }
  }
}
