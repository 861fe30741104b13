export enum ExperienceLevel {
  BEGINNER = "Beginner",
  INTERMEDIATE = "Intermediate",
  ADVANCED = "Advanced",
}

export enum TrainingGoal {
  GENERAL_FITNESS = "General fitness",
  STRENGTH = "Strength",
  HYPERTROPHY = "Hypertrophy / muscle gain",
  ENDURANCE = "Endurance",
  SPORT_SPECIFIC = "Sport-specific (e.g., basketball)",
}

export enum Mood {
  TIRED = "Tired / low energy",
  NEUTRAL = "Neutral",
  MOTIVATED = "Motivated",
  VERY_MOTIVATED = "Very motivated",
}

export enum FocusArea {
  FULL_BODY = "Full body",
  LEGS = "Legs",
  UPPER_BODY = "Upper body",
  CORE = "Core",
}

export enum LLMProvider {
  OPENAI = "openai",
  GEMINI = "gemini",
}
