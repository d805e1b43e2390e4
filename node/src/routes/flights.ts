/**
 * Flight search endpoints.
 *
 * POST /api/flights/search   { query } free text, or { criteria } structured
 * GET  /api/flights/:id      one catalog record
 */
import express, { type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { TravelAssistant } from '@/services/travel-assistant';
import { createSearchCriteria, describeCriteria, isUnconstrained } from '@/services/search-criteria';
import type { FlightSearchResult } from '@/types/flights';
import { correlationIdOf } from '@/middleware/correlation';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';

const searchRequestSchema = z.union([
  z.object({ query: z.string().trim().min(1, 'query must be a non-empty string') }).strict(),
  z.object({ criteria: z.record(z.unknown()) }).strict(),
]);

export function createFlightRoutes(assistant: TravelAssistant): express.Router {
  const router = express.Router();

  router.post('/search', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = searchRequestSchema.parse(req.body ?? {});
      let result: FlightSearchResult;
      if ('query' in body) {
        result = assistant.searchFlights(body.query);
      } else {
        const criteria = createSearchCriteria(body.criteria);
        result = { criteria, flights: assistant.searchWithCriteria(criteria) };
      }

      res.json(
        createSuccessResponse({
          criteria: result.criteria,
          filtered: !isUnconstrained(result.criteria),
          summary: describeCriteria(result.criteria),
          count: result.flights.length,
          flights: result.flights,
        }),
      );
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', (req: Request, res: Response) => {
    const flight = assistant.catalog.get(req.params.id);
    if (!flight) {
      res
        .status(404)
        .json(
          createErrorResponse(`Flight not found: ${req.params.id}`, 'not_found', {
            correlationId: correlationIdOf(res),
          }),
        );
      return;
    }
    res.json(createSuccessResponse(flight));
  });

  return router;
}
