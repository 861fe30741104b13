import { LLMProvider } from "../../common/common-enum";
import { AppConfig } from "../../configs/environment";
import { CompletionClient } from "../../types/model/completion.model";
import { GeminiCompletionClient } from "./geminiCompletion.client";
import { OpenAICompletionClient } from "./openaiCompletion.client";

export { GeminiCompletionClient, OpenAICompletionClient };

export function createCompletionClient(llm: AppConfig["llm"]): CompletionClient {
  switch (llm.provider) {
    case LLMProvider.GEMINI:
      return new GeminiCompletionClient(llm.gemini);
    case LLMProvider.OPENAI:
      return new OpenAICompletionClient(llm.openai);
  }
}
