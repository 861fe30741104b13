import { LLMProvider } from "../../common/common-enum";
import { PromptMessages } from "./prompt.model";

export interface CompletionRequest extends PromptMessages {
  temperature: number;
  maxTokens: number;
}

export interface CompletionUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  usage?: CompletionUsage;
}

export interface CompletionClient {
  readonly provider: LLMProvider;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
