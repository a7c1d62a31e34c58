import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { asyncRoute, requireAdvisor } from './handlers';

type IndustryResearchResponse = {
  research: string;
};

export const createResearchRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.get(
    '/industry/:industryName',
    asyncRoute(async (req, res) => {
      const { industryName } = req.params;

      if (!industryName.trim()) {
        res.status(400).json({ errors: [{ path: 'industry_name', message: 'industry_name is required' }] });
        return;
      }

      const research = await requireAdvisor(advisor).researchIndustry(industryName);
      const body: IndustryResearchResponse = { research };

      res.json(body);
    }),
  );

  return router;
};
