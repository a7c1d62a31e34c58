import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { toStudentProfile } from '../profile/context';
import { studentProfileRequestSchema } from '../profile/schema';
import { asyncRoute, parseBody, requireAdvisor } from './handlers';

type SkillsAnalysisResponse = {
  analysis: string;
};

export const createAnalyzeRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.post(
    '/skills',
    asyncRoute(async (req, res) => {
      const payload = parseBody(studentProfileRequestSchema, req, res);
      if (!payload) {
        return;
      }

      const analysis = await requireAdvisor(advisor).analyzeSkills(toStudentProfile(payload));
      const body: SkillsAnalysisResponse = { analysis };

      res.json(body);
    }),
  );

  return router;
};
