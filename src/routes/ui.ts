import { Router } from 'express';

import type { Advisor } from '../agents/advisor';
import { getDetail } from '../errors';
import { quickAdviceFormSchema, toValidationIssues } from '../profile/schema';
import { FormValues, renderAdvicePage } from '../ui/page';
import { asyncRoute, requireAdvisor } from './handlers';

const FORM_FIELDS = ['name', 'education', 'interests', 'skills', 'goal'] as const;

// Echoes back whatever text the visitor submitted so the form keeps its state.
const submittedValues = (body: unknown): Partial<FormValues> => {
  const values: Partial<FormValues> = {};

  if (!body || typeof body !== 'object') {
    return values;
  }

  const fields = new Map(Object.entries(body));
  FORM_FIELDS.forEach((field) => {
    const value = fields.get(field);
    if (typeof value === 'string') {
      values[field] = value;
    }
  });

  return values;
};

export const createUiRouter = (advisor: Advisor | null): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    res.type('html').send(renderAdvicePage());
  });

  router.post(
    '/advice',
    asyncRoute(async (req, res) => {
      const values = submittedValues(req.body);
      const validation = quickAdviceFormSchema.safeParse(req.body ?? {});

      if (!validation.success) {
        res
          .status(400)
          .type('html')
          .send(renderAdvicePage({ values, errors: toValidationIssues(validation.error) }));
        return;
      }

      let advice: string;
      try {
        advice = await requireAdvisor(advisor).getQuickAdvice(validation.data);
      } catch (error) {
        const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : '-';
        console.error(`[HTTP] ${requestId} Quick advice failed: ${getDetail(error)}`);
        res
          .status(500)
          .type('html')
          .send(renderAdvicePage({ values: validation.data, errors: [{ message: getDetail(error) }] }));
        return;
      }

      res.type('html').send(renderAdvicePage({ values: validation.data, advice }));
    }),
  );

  return router;
};
