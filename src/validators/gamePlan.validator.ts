import { z } from "zod";
import {
  ExperienceLevel,
  FocusArea,
  Mood,
  TrainingGoal,
} from "../common/common-enum";
import { FORM_DEFAULTS, GAMEPLAN_CONSTANTS } from "../utils/constants";

const { MIN_SESSION_MINUTES, MAX_SESSION_MINUTES, SESSION_MINUTES_STEP } =
  GAMEPLAN_CONSTANTS;

export const gamePlanBodySchema = z.object({
  level: z.nativeEnum(ExperienceLevel).default(FORM_DEFAULTS.level),
  goal: z.nativeEnum(TrainingGoal).default(FORM_DEFAULTS.goal),
  minutes: z
    .number({ invalid_type_error: "minutes must be a number" })
    .int("minutes must be a whole number")
    .min(MIN_SESSION_MINUTES, `minutes must be at least ${MIN_SESSION_MINUTES}`)
    .max(MAX_SESSION_MINUTES, `minutes must be at most ${MAX_SESSION_MINUTES}`)
    .refine((m) => m % SESSION_MINUTES_STEP === 0, {
      message: `minutes must be a multiple of ${SESSION_MINUTES_STEP}`,
    })
    .default(FORM_DEFAULTS.minutes),
  mood: z.nativeEnum(Mood).default(FORM_DEFAULTS.mood),
  focus: z.nativeEnum(FocusArea).default(FORM_DEFAULTS.focus),
  request: z.string({
    required_error: "request is required",
    invalid_type_error: "request must be a string",
  }),
});

export const generateGamePlanSchema = {
  body: gamePlanBodySchema,
};
