import { Advisor, CareerAdvisor } from './agents/advisor';
import type { LlmConfig } from './config';
import { OpenAiCompletionClient } from './llm/client';

/**
 * Builds the advisor for the configured provider, or null when no API key is
 * set. Callers decide whether a missing advisor is fatal.
 */
export const createAdvisor = (llm: LlmConfig): Advisor | null => {
  if (!llm.apiKey) {
    return null;
  }

  return new CareerAdvisor(new OpenAiCompletionClient(llm), { maxTokens: llm.maxTokens });
};
