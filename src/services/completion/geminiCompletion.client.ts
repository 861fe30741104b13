import { GoogleGenerativeAI } from "@google/generative-ai";
import { LLMProvider } from "../../common/common-enum";
import { logger } from "../../utils/logger";
import { CompletionError, errorMessage } from "../../utils/errors";
import {
  CompletionClient,
  CompletionRequest,
  CompletionResult,
} from "../../types/model/completion.model";

export interface GeminiCompletionOptions {
  apiKey: string;
  model: string;
}

export class GeminiCompletionClient implements CompletionClient {
  readonly provider = LLMProvider.GEMINI;
  readonly model: string;
  private gemini: GoogleGenerativeAI;

  constructor({ apiKey, model }: GeminiCompletionOptions) {
    this.gemini = new GoogleGenerativeAI(apiKey);
    this.model = model;
  }

  async complete({
    systemMessage,
    userMessage,
    temperature,
    maxTokens,
  }: CompletionRequest): Promise<CompletionResult> {
    const model = this.gemini.getGenerativeModel({
      model: this.model,
      systemInstruction: systemMessage,
      generationConfig: {
        temperature,
        maxOutputTokens: maxTokens,
      },
    });

    let content: string;
    let usage: CompletionResult["usage"];
    try {
      const result = await model.generateContent(userMessage);
      content = result.response.text().trim();
      const metadata = result.response.usageMetadata;
      usage = metadata
        ? {
            promptTokens: metadata.promptTokenCount,
            completionTokens: metadata.candidatesTokenCount,
            totalTokens: metadata.totalTokenCount,
          }
        : undefined;
    } catch (error) {
      logger.error("Gemini API error:", error);
      throw new CompletionError(errorMessage(error), this.provider);
    }

    if (!content) {
      throw new CompletionError("The completion service returned an empty response", this.provider);
    }

    return { text: content, model: this.model, usage };
  }
}
