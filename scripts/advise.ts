import fs from 'node:fs';
import path from 'node:path';

import type { Advisor } from '../src/agents/advisor';
import { createAdvisor } from '../src/advisorFactory';
import { loadConfig } from '../src/config';
import { toStudentProfile } from '../src/profile/context';
import { studentProfileRequestSchema, StudentProfile } from '../src/profile/schema';

export const DEFAULT_PROFILE_PATH = path.join(__dirname, 'sample-profile.json');
export const TARGET_CAREER = 'Machine Learning Engineer';
export const INDUSTRY = 'Artificial Intelligence and Machine Learning';
const RULE = '='.repeat(60);
const DIVIDER = '-'.repeat(60);

export const loadProfile = async (profilePath: string): Promise<StudentProfile> => {
  let raw: string;
  try {
    raw = await fs.promises.readFile(profilePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Profile file not found: ${profilePath}`);
    }
    throw error;
  }

  const validation = studentProfileRequestSchema.safeParse(JSON.parse(raw));

  if (!validation.success) {
    const details = validation.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid profile in ${profilePath}: ${details}`);
  }

  return toStudentProfile(validation.data);
};

const printSection = (title: string, body: string): void => {
  console.log(`\n\n${title}`);
  console.log(DIVIDER);
  console.log(body);
};

export const runDemo = async (advisor: Advisor, profilePath: string): Promise<void> => {
  const profile = await loadProfile(profilePath);

  console.log('Student Career Advisor\n');
  console.log(RULE);

  const advice = await advisor.getComprehensiveAdvice(profile);

  printSection('SKILLS ANALYSIS', advice.skillsAnalysis);
  printSection('CAREER MATCHES', advice.careerMatches);
  printSection('ACTION PLAN', advice.actionPlan);

  printSection(`LEARNING PATH FOR ${TARGET_CAREER.toUpperCase()}`, await advisor.createLearningPath(profile, TARGET_CAREER));
  printSection(`INDUSTRY RESEARCH: ${INDUSTRY}`, await advisor.researchIndustry(INDUSTRY));
};

const main = async (): Promise<void> => {
  const config = loadConfig();
  const advisor = createAdvisor(config.llm);

  if (!advisor) {
    throw new Error('OPENAI_API_KEY not found. Add it to .env before running the advisor.');
  }

  const profilePath = process.argv[2] ? path.resolve(process.argv[2]) : DEFAULT_PROFILE_PATH;
  await runDemo(advisor, profilePath);
};

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
