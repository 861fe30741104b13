import {
  ExperienceLevel,
  FocusArea,
  LLMProvider,
  Mood,
  TrainingGoal,
} from "../common/common-enum";
import { buildCatalog, buildSportKeywordTable } from "../loaders/catalogLoader";
import {
  CompletionClient,
  CompletionRequest,
  CompletionResult,
} from "../types/model/completion.model";
import { UserProfile } from "../types/model/userProfile.model";

export const testCatalog = () =>
  buildCatalog([
    { label: "legs", exercises: ["Squat", "Lunge", "Bridge", "Deadlift", "Calf Raise"] },
    { label: "core", exercises: ["Plank", "Dead Bug"] },
    { label: "full body", exercises: ["Burpee", "Swing", "Thruster", "Climber", "Carry"] },
    { label: "basketball", exercises: ["Box Jump", "Lateral Bound", "Slide Drill", "Depth Jump"] },
    { label: "soccer", exercises: ["Split Squat", "Nordic Curl", "Shuffle"] },
  ]);

export const testSportKeywords = () =>
  buildSportKeywordTable([
    { sport: "basketball", keywords: ["basketball", "hoops", "dunk"] },
    { sport: "soccer", keywords: ["soccer", "football"] },
    { sport: "running", keywords: ["running", "marathon"] },
  ]);

/** Deterministic stand-in for Math.random that cycles through `values`. */
export const sequenceRandom = (values: number[]) => {
  let i = 0;
  return () => values[i++ % values.length];
};

export const makeProfile = (overrides: Partial<UserProfile> = {}): UserProfile => ({
  level: ExperienceLevel.BEGINNER,
  goal: TrainingGoal.GENERAL_FITNESS,
  minutes: 20,
  mood: Mood.NEUTRAL,
  focus: FocusArea.LEGS,
  request: "leg day for basketball",
  ...overrides,
});

export class FakeCompletionClient implements CompletionClient {
  readonly provider = LLMProvider.OPENAI;
  readonly model = "fake-model";
  readonly requests: CompletionRequest[] = [];

  constructor(
    private readonly respond: (request: CompletionRequest) => Promise<CompletionResult> = async () => ({
      text: "## Your plan",
      model: "fake-model",
    })
  ) {}

  complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    return this.respond(request);
  }
}
