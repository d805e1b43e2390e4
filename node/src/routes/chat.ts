/**
 * POST /api/chat: one free-text message, routed to flight search or policy Q&A.
 * `capability` forces the route instead of guessing it from the wording.
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { CapabilityDispatcher } from '@/services/capability-dispatcher';
import { createSuccessResponse } from '@/utils/errorResponse';

const chatRequestSchema = z
  .object({
    message: z.string().trim().min(1, 'message must be a non-empty string'),
    capability: z.enum(['flight_search', 'policy_search']).optional(),
  })
  .strict();

export function createChatRoutes(dispatcher: CapabilityDispatcher): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { message, capability } = chatRequestSchema.parse(req.body ?? {});
      const result = await dispatcher.dispatch(message, capability);
      res.json(createSuccessResponse(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
