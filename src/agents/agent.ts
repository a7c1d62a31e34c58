import type { CompletionClient } from '../llm/client';
import { AgentRole, SYSTEM_PROMPTS } from './roles';

export type AgentContext = Record<string, string>;

export const DEFAULT_MAX_TOKENS = 2000;

export const renderContext = (context: AgentContext): string =>
  Object.entries(context)
    .map(([key, value]) => `${key}: ${value}`)
    .join('\n');

export const buildAgentMessage = (query: string, context?: AgentContext): string => {
  if (!context || Object.keys(context).length === 0) {
    return query;
  }

  return `Context: ${renderContext(context)}\n\n${query}`;
};

/**
 * One specialist in the advisor. Every call is a single-turn request made of
 * the role's fixed system prompt and one user message.
 */
export class CareerAdvisorAgent {
  readonly role: AgentRole;

  private readonly client: CompletionClient;

  private readonly maxTokens: number;

  constructor(role: AgentRole, client: CompletionClient, maxTokens = DEFAULT_MAX_TOKENS) {
    this.role = role;
    this.client = client;
    this.maxTokens = maxTokens;
  }

  get systemPrompt(): string {
    return SYSTEM_PROMPTS[this.role];
  }

  async process(query: string, context?: AgentContext): Promise<string> {
    return this.client.complete({
      system: this.systemPrompt,
      prompt: buildAgentMessage(query, context),
      maxTokens: this.maxTokens,
    });
  }
}
