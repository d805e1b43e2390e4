// src/services/search-criteria.ts — structured criteria input, validation and display
import { z } from 'zod';
import { ALLIANCES, type SearchCriteria } from '@/types/flights';
import { InvalidArgumentError } from '@/utils/errors';

export const searchCriteriaSchema = z
  .object({
    origin: z.string().trim().min(1).optional(),
    destination: z.string().trim().min(1).optional(),
    departure: z
      .object({
        month: z.number().int().min(1).max(12),
        year: z.number().int().min(1900).max(9999),
      })
      .strict()
      .optional(),
    alliance: z.enum(ALLIANCES).optional(),
    airline: z.string().trim().min(1).optional(),
    maxPrice: z.number().finite().positive().optional(),
    refundableOnly: z.boolean().optional(),
    avoidOvernightLayover: z.boolean().optional(),
    maxLayovers: z.number().int().nonnegative().optional(),
  })
  .strict();

/**
 * Build criteria from caller-supplied structured input. `false` flags are dropped: a flag only
 * ever narrows the search.
 */
export function createSearchCriteria(input: unknown): SearchCriteria {
  const parsed = searchCriteriaSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(
      'invalid search criteria',
      parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  const { refundableOnly, avoidOvernightLayover, ...rest } = parsed.data;
  const criteria: SearchCriteria = {};
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) Object.assign(criteria, { [key]: value });
  }
  if (refundableOnly) criteria.refundableOnly = true;
  if (avoidOvernightLayover) criteria.avoidOvernightLayover = true;
  return criteria;
}

export function isUnconstrained(criteria: SearchCriteria): boolean {
  return Object.values(criteria).every((v) => v === undefined);
}

const MONTH_LABELS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

/** Human-readable summary, e.g. "to Tokyo, Star Alliance, under $900". */
export function describeCriteria(c: SearchCriteria): string {
  const parts: string[] = [];
  if (c.origin) parts.push(`from ${c.origin}`);
  if (c.destination) parts.push(`to ${c.destination}`);
  if (c.departure) parts.push(`in ${MONTH_LABELS[c.departure.month - 1]} ${c.departure.year}`);
  if (c.alliance) parts.push(c.alliance);
  if (c.airline) parts.push(c.airline);
  if (c.maxPrice !== undefined) parts.push(`under $${c.maxPrice}`);
  if (c.refundableOnly) parts.push('refundable only');
  if (c.avoidOvernightLayover) parts.push('no overnight layovers');
  if (c.maxLayovers !== undefined) {
    parts.push(c.maxLayovers === 0 ? 'nonstop' : `at most ${c.maxLayovers} layover${c.maxLayovers === 1 ? '' : 's'}`);
  }
  return parts.join(', ');
}
