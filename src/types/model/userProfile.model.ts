import {
  ExperienceLevel,
  FocusArea,
  Mood,
  TrainingGoal,
} from "../../common/common-enum";

/**
 * One submission of the training form. Lives for a single request.
 */
export interface UserProfile {
  level: ExperienceLevel;
  goal: TrainingGoal;
  minutes: number;
  mood: Mood;
  focus: FocusArea;
  /** Free text typed by the user, passed to the prompt verbatim. */
  request: string;
}
