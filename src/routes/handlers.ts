import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { z } from 'zod';

import type { Advisor } from '../agents/advisor';
import { AdvisorUnavailableError } from '../errors';
import { toValidationIssues } from '../profile/schema';

export const requireAdvisor = (advisor: Advisor | null): Advisor => {
  if (!advisor) {
    throw new AdvisorUnavailableError();
  }
  return advisor;
};

// Express 4 does not forward rejected promises to the error middleware on its own.
export const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

/**
 * Validates a request body, answering 400 with the issue list when it does not
 * match. Returns undefined once the response has been sent.
 */
export const parseBody = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  req: Request,
  res: Response,
): z.infer<Schema> | undefined => {
  const validation = schema.safeParse(req.body ?? {});

  if (!validation.success) {
    res.status(400).json({ errors: toValidationIssues(validation.error) });
    return undefined;
  }

  return validation.data;
};
