export interface PromptMessages {
  systemMessage: string;
  userMessage: string;
}
