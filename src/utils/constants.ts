import {
  ExperienceLevel,
  FocusArea,
  Mood,
  TrainingGoal,
} from "../common/common-enum";

export const GAMEPLAN_CONSTANTS = {
  DEFAULT_LABEL: "full body",
  NO_SPORT: "none",
  HINT_EXERCISE_COUNT: 3,
  TEMPERATURE: 0.8,
  MAX_TOKENS: 900,
  MIN_SESSION_MINUTES: 10,
  MAX_SESSION_MINUTES: 90,
  SESSION_MINUTES_STEP: 5,
} as const;

export const FORM_DEFAULTS = {
  level: ExperienceLevel.BEGINNER,
  goal: TrainingGoal.GENERAL_FITNESS,
  minutes: 30,
  mood: Mood.NEUTRAL,
  focus: FocusArea.FULL_BODY,
} as const;

export const MESSAGES = {
  EMPTY_REQUEST: "Please type something about the workout you want.",
  GENERATION_FAILED: "Something went wrong while generating your plan",
  MISSING_CREDENTIAL: (key: string) =>
    `${key} not found. Please set it as an environment variable or in a .env file.`,
} as const;

export const REQUEST_PLACEHOLDER =
  "Example: I play intramural basketball and want a 20-minute leg workout to improve my explosiveness.";

export const EXAMPLE_PROMPTS = [
  "Make me a 20-minute leg workout for basketball.",
  "I only have 10 minutes and I feel tired. Give me something light.",
  "Design a 30-minute upper body workout for a beginner.",
] as const;
