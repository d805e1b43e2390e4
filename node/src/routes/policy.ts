import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { TravelAssistant } from '@/services/travel-assistant';
import { createSuccessResponse } from '@/utils/errorResponse';

const answerRequestSchema = z
  .object({
    question: z.string().trim().min(1, 'question must be a non-empty string'),
    k: z.number().int().positive().optional(),
  })
  .strict();

/**
 * POST /api/policy/answer
 * Grounded answer plus the passages it was built from.
 */
export function createPolicyRoutes(assistant: TravelAssistant): express.Router {
  const router = express.Router();

  router.post('/answer', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question, k } = answerRequestSchema.parse(req.body ?? {});
      const { answer, passages } = await assistant.answerPolicyQuestion(question, k);
      res.json(
        createSuccessResponse({
          answer,
          passages: passages.map(({ chunk, score }) => ({
            index: chunk.index,
            source: chunk.source,
            score,
            text: chunk.text,
          })),
        }),
      );
    } catch (err) {
      next(err);
    }
  });

  return router;
}
