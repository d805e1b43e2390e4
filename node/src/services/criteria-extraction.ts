// src/services/criteria-extraction.ts
// Free text → SearchCriteria by keyword/pattern rules. Extraction never throws: text it cannot
// read leaves the affected fields unconstrained.
import type { SearchCriteria } from '@/types/flights';
import {
  CRITERIA_RULES,
  buildLocationRule,
  type CriteriaPatch,
  type CriteriaRule,
  type RuleContext,
} from './criteria-rules';

export interface CriteriaExtractorOptions {
  /** Known origin/destination names (usually the catalog's). Without them no location is extracted. */
  locations?: readonly string[];
  /** Reference "today" for month resolution. */
  now?: () => Date;
}

interface RuleHit {
  index: number;
  order: number;
  patch: CriteriaPatch;
}

function applyPatch(criteria: SearchCriteria, patch: CriteriaPatch): void {
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      Reflect.deleteProperty(criteria, key);
    } else {
      Object.assign(criteria, { [key]: value });
    }
  }
}

export class CriteriaExtractor {
  private readonly rules: readonly CriteriaRule[];
  private readonly now: () => Date;

  constructor(options: CriteriaExtractorOptions = {}) {
    const locationRule = buildLocationRule(options.locations ?? []);
    this.rules = locationRule ? [...CRITERIA_RULES, locationRule] : CRITERIA_RULES;
    this.now = options.now ?? (() => new Date());
  }

  extract(text: string): SearchCriteria {
    const criteria: SearchCriteria = {};
    if (typeof text !== 'string' || text.trim() === '') return criteria;

    const ctx: RuleContext = { text: text.toLowerCase(), referenceDate: this.now() };
    const hits: RuleHit[] = [];

    this.rules.forEach((rule, order) => {
      const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);
      let m: RegExpExecArray | null;
      while ((m = pattern.exec(ctx.text)) !== null) {
        if (m[0].length === 0) {
          pattern.lastIndex++;
          continue;
        }
        const patch = rule.effect(m, ctx);
        if (patch) hits.push({ index: m.index, order, patch });
      }
    });

    // Scan order: position in the text, then table order. Later hits overwrite earlier ones.
    hits.sort((a, b) => a.index - b.index || a.order - b.order);
    for (const hit of hits) applyPatch(criteria, hit.patch);
    return criteria;
  }
}

/** One-off extraction with default options (no location vocabulary, current date). */
export function extractCriteria(text: string, options?: CriteriaExtractorOptions): SearchCriteria {
  return new CriteriaExtractor(options).extract(text);
}
