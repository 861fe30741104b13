import { UserProfile } from "../types/model/userProfile.model";
import { PromptMessages } from "../types/model/prompt.model";

export const SYSTEM_PROMPT = `You are GamePlan, an AI training companion and coach.

Your job:
- Ask brief clarifying questions only when necessary.
- Create structured, safe workout plans based on the user's time, level, mood, and goals.
- Use encouraging, human-like, but not cringey language.
- Assume the user has basic health clearance; if not sure, remind them to consult a professional.
- Always organize output using clear headings and bullet points.

IMPORTANT:
- Keep it within the user's requested time.
- Include sets, reps, and rest suggestions.
- Add 1-2 short motivational lines that feel like a friendly coach.`;

export const RESPONSE_SECTIONS = [
  "Short summary (1–2 sentences) of today's plan.",
  "Warm-up (5 minutes max).",
  "Main workout (clearly numbered exercises with sets/reps/rest).",
  "Optional finisher (if time allows).",
  "Cool-down or stretching ideas.",
  "1–2 motivational lines that feel like a supportive coach.",
] as const;

export function buildExerciseHint(exercises: readonly string[]): string {
  return `For this user, you might want to include some of these exercises when relevant: ${exercises.join(", ")}.`;
}

/**
 * Pure: the same profile and exercise list always give the same messages.
 * The free-text request is embedded as typed, without escaping.
 */
export function buildPrompt(
  profile: UserProfile,
  sampledExercises: readonly string[]
): PromptMessages {
  const sections = RESPONSE_SECTIONS.map((s, i) => `${i + 1}. ${s}`).join("\n");

  const userMessage = `User profile:
- Experience level: ${profile.level}
- Goal: ${profile.goal}
- Session length: ${profile.minutes} minutes
- Mood: ${profile.mood}
- Focus area: ${profile.focus}

User request:
"""${profile.request}"""

Additional hint from a small exercise dataset:
${buildExerciseHint(sampledExercises)}

Please respond with:

${sections}`;

  return { systemMessage: SYSTEM_PROMPT, userMessage };
}
