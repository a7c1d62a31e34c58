import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { toStudentProfile } from '../profile/context';
import { studentProfileRequestSchema } from '../profile/schema';
import { asyncRoute, parseBody, requireAdvisor } from './handlers';

type CareerMatchesResponse = {
  matches: string;
};

export const createMatchRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.post(
    '/careers',
    asyncRoute(async (req, res) => {
      const payload = parseBody(studentProfileRequestSchema, req, res);
      if (!payload) {
        return;
      }

      const matches = await requireAdvisor(advisor).findCareerMatches(toStudentProfile(payload));
      const body: CareerMatchesResponse = { matches };

      res.json(body);
    }),
  );

  return router;
};
