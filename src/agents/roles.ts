import {
  CAREER_MATCHER_PROMPT,
  COORDINATOR_PROMPT,
  INDUSTRY_RESEARCHER_PROMPT,
  LEARNING_PATHFINDER_PROMPT,
  SKILLS_ANALYZER_PROMPT,
} from '../llm/prompts';

export const AGENT_ROLES = [
  'coordinator',
  'skills_analyzer',
  'career_matcher',
  'learning_pathfinder',
  'industry_researcher',
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

export const SYSTEM_PROMPTS: Readonly<Record<AgentRole, string>> = {
  coordinator: COORDINATOR_PROMPT,
  skills_analyzer: SKILLS_ANALYZER_PROMPT,
  career_matcher: CAREER_MATCHER_PROMPT,
  learning_pathfinder: LEARNING_PATHFINDER_PROMPT,
  industry_researcher: INDUSTRY_RESEARCHER_PROMPT,
};
