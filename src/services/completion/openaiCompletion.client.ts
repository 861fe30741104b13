import OpenAI from "openai";
import { LLMProvider } from "../../common/common-enum";
import { logger } from "../../utils/logger";
import { CompletionError, errorMessage } from "../../utils/errors";
import {
  CompletionClient,
  CompletionRequest,
  CompletionResult,
} from "../../types/model/completion.model";

export interface OpenAICompletionOptions {
  apiKey: string;
  model: string;
}

export class OpenAICompletionClient implements CompletionClient {
  readonly provider = LLMProvider.OPENAI;
  readonly model: string;
  private openai: OpenAI;

  constructor({ apiKey, model }: OpenAICompletionOptions) {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
  }

  async complete({
    systemMessage,
    userMessage,
    temperature,
    maxTokens,
  }: CompletionRequest): Promise<CompletionResult> {
    let response: OpenAI.Chat.Completions.ChatCompletion;
    try {
      response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: systemMessage },
          { role: "user", content: userMessage },
        ],
        temperature,
        max_tokens: maxTokens,
      });
    } catch (error) {
      logger.error("OpenAI API error:", error);
      throw new CompletionError(errorMessage(error), this.provider);
    }

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new CompletionError("The completion service returned an empty response", this.provider);
    }

    return {
      text: content,
      model: response.model || this.model,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }
}
