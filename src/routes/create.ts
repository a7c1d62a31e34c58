import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { toStudentProfile } from '../profile/context';
import { learningPathRequestSchema } from '../profile/schema';
import { asyncRoute, parseBody, requireAdvisor } from './handlers';

type LearningPathResponse = {
  learning_path: string;
};

export const createLearningPathRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.post(
    '/learning-path',
    asyncRoute(async (req, res) => {
      const payload = parseBody(learningPathRequestSchema, req, res);
      if (!payload) {
        return;
      }

      const learningPath = await requireAdvisor(advisor).createLearningPath(
        toStudentProfile(payload.profile),
        payload.target_career,
      );
      const body: LearningPathResponse = { learning_path: learningPath };

      res.json(body);
    }),
  );

  return router;
};
