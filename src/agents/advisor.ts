import type { CompletionClient } from '../llm/client';
import {
  actionPlanTask,
  CAREER_MATCHES_TASK,
  industryResearchTask,
  learningPathTask,
  quickAdvicePrompt,
  SKILLS_ANALYSIS_TASK,
} from '../llm/prompts';
import { buildStudentContext } from '../profile/context';
import type { QuickAdviceForm, StudentProfile } from '../profile/schema';
import { CareerAdvisorAgent, DEFAULT_MAX_TOKENS } from './agent';
import type { AgentRole } from './roles';

export type ComprehensiveAdvice = {
  skillsAnalysis: string;
  careerMatches: string;
  actionPlan: string;
};

export interface Advisor {
  analyzeSkills(profile: StudentProfile): Promise<string>;
  findCareerMatches(profile: StudentProfile): Promise<string>;
  createLearningPath(profile: StudentProfile, targetCareer: string): Promise<string>;
  researchIndustry(industry: string): Promise<string>;
  getComprehensiveAdvice(profile: StudentProfile): Promise<ComprehensiveAdvice>;
  getQuickAdvice(form: QuickAdviceForm): Promise<string>;
}

type CareerAdvisorOptions = {
  maxTokens?: number;
};

export class CareerAdvisor implements Advisor {
  private readonly agents: Record<AgentRole, CareerAdvisorAgent>;

  private readonly client: CompletionClient;

  private readonly maxTokens: number;

  constructor(client: CompletionClient, { maxTokens = DEFAULT_MAX_TOKENS }: CareerAdvisorOptions = {}) {
    this.client = client;
    this.maxTokens = maxTokens;

    this.agents = {
      coordinator: new CareerAdvisorAgent('coordinator', client, maxTokens),
      skills_analyzer: new CareerAdvisorAgent('skills_analyzer', client, maxTokens),
      career_matcher: new CareerAdvisorAgent('career_matcher', client, maxTokens),
      learning_pathfinder: new CareerAdvisorAgent('learning_pathfinder', client, maxTokens),
      industry_researcher: new CareerAdvisorAgent('industry_researcher', client, maxTokens),
    };
  }

  async analyzeSkills(profile: StudentProfile): Promise<string> {
    return this.agents.skills_analyzer.process(SKILLS_ANALYSIS_TASK, {
      profile: buildStudentContext(profile),
    });
  }

  async findCareerMatches(profile: StudentProfile): Promise<string> {
    return this.agents.career_matcher.process(CAREER_MATCHES_TASK, {
      profile: buildStudentContext(profile),
    });
  }

  async createLearningPath(profile: StudentProfile, targetCareer: string): Promise<string> {
    return this.agents.learning_pathfinder.process(learningPathTask(targetCareer), {
      profile: buildStudentContext(profile),
    });
  }

  async researchIndustry(industry: string): Promise<string> {
    return this.agents.industry_researcher.process(industryResearchTask(industry));
  }

  async getComprehensiveAdvice(profile: StudentProfile): Promise<ComprehensiveAdvice> {
    console.info(`[ADVISOR] Comprehensive advice for ${profile.name}: skills analysis.`);
    const skillsAnalysis = await this.analyzeSkills(profile);

    console.info(`[ADVISOR] Comprehensive advice for ${profile.name}: career matches.`);
    const careerMatches = await this.findCareerMatches(profile);

    console.info(`[ADVISOR] Comprehensive advice for ${profile.name}: action plan.`);
    const actionPlan = await this.agents.coordinator.process(
      actionPlanTask({
        skillsAnalysis,
        careerMatches,
        studentContext: buildStudentContext(profile),
      }),
    );

    return { skillsAnalysis, careerMatches, actionPlan };
  }

  // Single self-contained prompt, outside the agent catalogue.
  async getQuickAdvice(form: QuickAdviceForm): Promise<string> {
    return this.client.complete({
      prompt: quickAdvicePrompt(form),
      maxTokens: this.maxTokens,
    });
  }
}
