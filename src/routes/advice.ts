import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { toStudentProfile } from '../profile/context';
import { studentProfileRequestSchema } from '../profile/schema';
import { asyncRoute, parseBody, requireAdvisor } from './handlers';

type ComprehensiveAdviceResponse = {
  skills_analysis: string;
  career_matches: string;
  action_plan: string;
};

export const createAdviceRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.post(
    '/comprehensive',
    asyncRoute(async (req, res) => {
      const payload = parseBody(studentProfileRequestSchema, req, res);
      if (!payload) {
        return;
      }

      const advice = await requireAdvisor(advisor).getComprehensiveAdvice(toStudentProfile(payload));
      const body: ComprehensiveAdviceResponse = {
        skills_analysis: advice.skillsAnalysis,
        career_matches: advice.careerMatches,
        action_plan: advice.actionPlan,
      };

      res.json(body);
    }),
  );

  return router;
};
