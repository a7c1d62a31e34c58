import { Router } from 'express';

import type { Advisor } from '../agents/advisor';

export const SERVICE_NAME = 'Student Career Advisor API';
export const SERVICE_VERSION = '1.0.0';

export const ENDPOINTS = {
  skills_analysis: '/analyze/skills',
  career_matches: '/match/careers',
  learning_path: '/create/learning-path',
  industry_research: '/research/industry/{industry_name}',
  comprehensive_advice: '/advice/comprehensive',
  quick_advice_form: '/ui',
} as const;

export const createInfoRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ENDPOINTS,
    });
  });

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      advisor_initialized: advisor !== null,
    });
  });

  return router;
};
