import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { PerfController } from '../../services/perf-controller.js';

const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const jobInputSchema = z
  .object({
    prompt: z.string().min(1).optional(),
    messages: z.array(chatMessageSchema).min(1).optional(),
    model: z.string().min(1).optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
  })
  .refine((body) => body.prompt !== undefined || body.messages !== undefined, {
    message: 'prompt or messages is required',
  });

/**
 * Create job submission routes
 * @param controller - admits jobs into the bounded queue
 */
export function createJobRoutes(controller: PerfController): Router {
  const router = Router();

  /**
   * Submit one completion job. Never blocks on queue space.
   */
  router.post('/', (req: Request, res: Response, next: NextFunction): void => {
    const parsed = jobInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Bad Request',
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
        timestamp: new Date().toISOString(),
      });
      return;
    }

    try {
      const result = controller.submit(parsed.data);
      if (result.accepted) {
        res.status(202).json({ accepted: true, jobId: result.jobId });
        return;
      }

      res
        .status(result.reason === 'queue_full' ? 429 : 503)
        .json({ accepted: false, reason: result.reason });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
