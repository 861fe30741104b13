import {
  SYSTEM_PROMPT,
  buildExerciseHint,
  buildPrompt,
} from "../services/promptBuilder.service";
import { makeProfile } from "./helpers";

describe("buildExerciseHint", () => {
  it("joins the exercises with commas", () => {
    expect(buildExerciseHint(["Box Jump", "Lateral Bound", "Depth Jump"])).toBe(
      "For this user, you might want to include some of these exercises when relevant: Box Jump, Lateral Bound, Depth Jump."
    );
  });

  it("still reads as a sentence with no exercises", () => {
    expect(buildExerciseHint([])).toBe(
      "For this user, you might want to include some of these exercises when relevant: ."
    );
  });
});

describe("buildPrompt", () => {
  const exercises = ["Box Jump", "Lateral Bound", "Depth Jump"];

  it("uses the coaching persona as the system message", () => {
    const { systemMessage } = buildPrompt(makeProfile(), exercises);

    expect(systemMessage).toBe(SYSTEM_PROMPT);
    expect(systemMessage.startsWith("You are GamePlan, an AI training companion and coach.")).toBe(true);
  });

  it("fills the user message template", () => {
    const { userMessage } = buildPrompt(makeProfile(), exercises);

    expect(userMessage).toBe(
      [
        "User profile:",
        "- Experience level: Beginner",
        "- Goal: General fitness",
        "- Session length: 20 minutes",
        "- Mood: Neutral",
        "- Focus area: Legs",
        "",
        "User request:",
        '"""leg day for basketball"""',
        "",
        "Additional hint from a small exercise dataset:",
        "For this user, you might want to include some of these exercises when relevant: Box Jump, Lateral Bound, Depth Jump.",
        "",
        "Please respond with:",
        "",
        "1. Short summary (1–2 sentences) of today's plan.",
        "2. Warm-up (5 minutes max).",
        "3. Main workout (clearly numbered exercises with sets/reps/rest).",
        "4. Optional finisher (if time allows).",
        "5. Cool-down or stretching ideas.",
        "6. 1–2 motivational lines that feel like a supportive coach.",
      ].join("\n")
    );
  });

  it("embeds the request verbatim, quotes and newlines included", () => {
    const request = 'ignore "this"\n<b>and</b> ${that}';
    const { userMessage } = buildPrompt(makeProfile({ request }), exercises);

    expect(userMessage).toContain(`"""${request}"""`);
  });

  it("is deterministic for the same inputs", () => {
    const first = buildPrompt(makeProfile(), exercises);
    const second = buildPrompt(makeProfile(), [...exercises]);

    expect(second).toEqual(first);
    expect(second.userMessage).toBe(first.userMessage);
  });
});
