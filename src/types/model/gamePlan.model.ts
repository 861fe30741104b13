import { LLMProvider } from "../../common/common-enum";
import { CompletionUsage } from "./completion.model";
import { PromptMessages } from "./prompt.model";

export interface SamplingDecision {
  /** "none" when nothing matched or detection is off. */
  detectedSport: string;
  samplingLabel: string;
  suggestedExercises: string[];
}

export interface GamePlanPreview extends SamplingDecision {
  prompt: PromptMessages;
}

export interface GeneratedPlan extends SamplingDecision {
  id: string;
  /** Markdown as returned by the completion service, never parsed. */
  plan: string;
  provider: LLMProvider;
  model: string;
  usage?: CompletionUsage;
  generationTime: number;
}

export interface FormSelectOption<T extends string> {
  name: string;
  label: string;
  options: T[];
  default: T;
}

export interface FormOptions {
  level: FormSelectOption<string>;
  goal: FormSelectOption<string>;
  mood: FormSelectOption<string>;
  focus: FormSelectOption<string>;
  minutes: {
    name: string;
    label: string;
    min: number;
    max: number;
    step: number;
    default: number;
  };
  request: {
    name: string;
    label: string;
    placeholder: string;
    examples: string[];
  };
}
