import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { withSource } from '../logger';

const log = withSource('validateRequest');

const CheckDocumentBodySchema = z.object({
  // Empty content is allowed: it sketches to the sentinel sketch
  content: z.string(),
  id: z
    .string()
    .trim()
    .min(1, { message: 'id must not be blank' })
    .max(200)
    .optional(),
});

function sendValidationError(res: Response, reqPath: string, issues: z.ZodIssue[]) {
  const requestId: unknown = res.locals?.requestId;
  if (issues.length) {
    log.warn({ path: reqPath, issues, requestId }, 'request validation failed');
  }
  const body: { error: string; details: z.ZodIssue[]; requestId?: string } = {
    error: 'Invalid payload',
    details: issues,
  };
  if (typeof requestId === 'string') body.requestId = requestId;
  return res.status(400).json(body);
}

export function validateCheckDocumentBody(req: Request, res: Response, next: NextFunction) {
  const parsed = CheckDocumentBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return sendValidationError(res, req.path, parsed.error.issues);
  }
  req.validated = { ...(req.validated || {}), body: parsed.data };
  return next();
}
