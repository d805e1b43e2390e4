// src/services/criteria-rules.ts
// Declarative (pattern, effect) table behind criteria extraction. Every pattern is global and
// matched against the lower-cased query; the extractor applies all matches in text order, so for
// conflicting cues the last one in the text wins.
import type { Alliance, MonthWindow, SearchCriteria } from '@/types/flights';

/** A patch applied to the criteria being built. A key present with `undefined` clears that field. */
export type CriteriaPatch = Partial<SearchCriteria>;

export interface RuleContext {
  /** Lower-cased query text the pattern ran against. */
  text: string;
  referenceDate: Date;
}

export interface CriteriaRule {
  name: string;
  pattern: RegExp;
  /** Return null when the match carries no constraint. */
  effect(match: RegExpExecArray, ctx: RuleContext): CriteriaPatch | null;
}

// ── Alliances ─────────────────────────────────────────────────────────

const ALLIANCE_ALIASES: Record<Exclude<Alliance, 'None'>, string[]> = {
  'Star Alliance': [
    'star alliance', 'lufthansa', 'united airlines', 'singapore airlines', 'turkish airlines',
    'thai airways', 'all nippon', 'air canada', 'eva air', 'air india', 'asiana', 'egyptair',
    'ethiopian airlines', 'swiss international',
  ],
  Oneworld: [
    'oneworld', 'one world', 'british airways', 'qatar airways', 'cathay pacific', 'japan airlines',
    'finnair', 'qantas', 'iberia', 'american airlines', 'malaysia airlines', 'royal jordanian',
  ],
  SkyTeam: [
    'skyteam', 'sky team', 'air france', 'klm', 'delta', 'korean air', 'saudia', 'vietnam airlines',
    'kenya airways', 'china airlines',
  ],
};

function phrasePattern(phrase: string): string {
  return phrase
    .trim()
    .split(/\s+/)
    .map((w) => w.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('[\\s-]+');
}

const allianceRules: CriteriaRule[] = (['Star Alliance', 'Oneworld', 'SkyTeam'] as const).map((alliance) => ({
  name: `alliance:${alliance}`,
  pattern: new RegExp(`\\b(?:${ALLIANCE_ALIASES[alliance].map(phrasePattern).join('|')})\\b`, 'g'),
  effect: () => ({ alliance }),
}));

// ── Overnight layovers ────────────────────────────────────────────────

/** Tokens before a keyword ("overnight", "refundable") inspected for a negation cue. */
export const NEGATION_WINDOW_TOKENS = 4;

const NEGATION_CUES = new Set([
  'avoid', 'avoiding', 'no', 'without', 'skip', 'skipping', 'not', "don't", 'dont', 'never',
  'exclude', 'excluding',
]);

/** Start of the clause containing `index`: after the last , ; . ! ? or "but". */
function clauseStart(text: string, index: number): number {
  const before = text.slice(0, index);
  let start = 0;
  const delimiter = /[,;.!?]|\bbut\b/g;
  let m: RegExpExecArray | null;
  while ((m = delimiter.exec(before)) !== null) {
    start = m.index + m[0].length;
  }
  return start;
}

/** A cue followed by one of these is permissive ("don't mind", "never mind"). */
const CANCELLING_TOKENS = new Set(['mind', 'care']);

function negatedWithinClause(text: string, index: number): boolean {
  const clause = text.slice(clauseStart(text, index), index);
  const tokens = (clause.match(/[a-z]+(?:'[a-z]+)?/g) ?? []).slice(-NEGATION_WINDOW_TOKENS);
  return tokens.some((t, i) => NEGATION_CUES.has(t) && !CANCELLING_TOKENS.has(tokens[i + 1] ?? ''));
}

const overnightRule: CriteriaRule = {
  name: 'avoid-overnight',
  pattern: /\bovernight\b/g,
  effect: (match, ctx) => (negatedWithinClause(ctx.text, match.index) ? { avoidOvernightLayover: true } : null),
};

// ── Month / year ──────────────────────────────────────────────────────

const MONTHS: Record<string, number> = {
  january: 1, february: 2, march: 3, april: 4, may: 5, june: 6, july: 7, august: 8,
  september: 9, october: 10, november: 11, december: 12,
  jan: 1, feb: 2, mar: 3, apr: 4, jun: 6, jul: 7, aug: 8, sept: 9, sep: 9, oct: 10, nov: 11, dec: 12,
};

/** Next occurrence of `month` that is not before the reference month. */
export function resolveMonth(month: number, referenceDate: Date, year?: number): MonthWindow {
  if (year !== undefined) return { month, year };
  const refYear = referenceDate.getUTCFullYear();
  const refMonth = referenceDate.getUTCMonth() + 1;
  return { month, year: month >= refMonth ? refYear : refYear + 1 };
}

function shiftMonth(referenceDate: Date, by: number): MonthWindow {
  const zeroBased = referenceDate.getUTCMonth() + by;
  return {
    month: (((zeroBased % 12) + 12) % 12) + 1,
    year: referenceDate.getUTCFullYear() + Math.floor(zeroBased / 12),
  };
}

const monthNames = Object.keys(MONTHS)
  .filter((name) => name !== 'may')
  .sort((a, b) => b.length - a.length)
  .join('|');

const monthRules: CriteriaRule[] = [
  {
    name: 'month',
    pattern: new RegExp(`\\b(${monthNames})\\b\\.?(?:,?\\s+(\\d{4})\\b)?`, 'g'),
    effect: (m, ctx) => ({
      departure: resolveMonth(MONTHS[m[1]], ctx.referenceDate, m[2] ? Number(m[2]) : undefined),
    }),
  },
  {
    // "may" is also a verb: only a month after a preposition or before a year
    name: 'month:may',
    pattern: /\b(?:(in|during|for|of|early|mid|late|by|until)[\s-]+)?may\b(?:,?\s+(\d{4})\b)?/g,
    effect: (m, ctx) =>
      m[1] || m[2]
        ? { departure: resolveMonth(5, ctx.referenceDate, m[2] ? Number(m[2]) : undefined) }
        : null,
  },
  {
    name: 'month:relative',
    pattern: /\b(this|next)\s+month\b/g,
    effect: (m, ctx) => ({ departure: shiftMonth(ctx.referenceDate, m[1] === 'next' ? 1 : 0) }),
  },
];

// ── Price ─────────────────────────────────────────────────────────────

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)\b`;
/** Amounts that count something other than money ("up to 2 layovers"). */
const NOT_MONEY = String.raw`(?!\s*(?:layovers?|stops?|connections?|days?|nights?|weeks?|hours?|passengers?|people|adults?|travell?ers?)\b)`;

function pricePatch(raw: string): CriteriaPatch | null {
  const value = Number(raw.replace(/,/g, ''));
  return Number.isFinite(value) && value > 0 ? { maxPrice: value } : null;
}

const priceRules: CriteriaRule[] = [
  {
    name: 'price:bound',
    pattern: new RegExp(
      String.raw`\b(?:under|below|less\s+than|cheaper\s+than|up\s+to|at\s+most|no\s+more\s+than|max(?:imum)?|budget(?:\s+of)?)\s+(?:us\$|\$|usd)?\s?${AMOUNT}${NOT_MONEY}`,
      'g',
    ),
    effect: (m) => pricePatch(m[1]),
  },
  {
    name: 'price:currency-prefix',
    pattern: new RegExp(String.raw`(?:us\$|\$|\busd)\s?${AMOUNT}`, 'g'),
    effect: (m) => pricePatch(m[1]),
  },
  {
    name: 'price:currency-suffix',
    pattern: new RegExp(String.raw`\b${AMOUNT}\s?(?:usd|dollars?|bucks)\b`, 'g'),
    effect: (m) => pricePatch(m[1]),
  },
];

// ── Refundable ────────────────────────────────────────────────────────

const refundableRule: CriteriaRule = {
  name: 'refundable',
  pattern: /\b(non[\s-]?)?refundable\b/g,
  effect: (m, ctx) =>
    m[1] || negatedWithinClause(ctx.text, m.index) ? { refundableOnly: undefined } : { refundableOnly: true },
};

// ── Layovers ──────────────────────────────────────────────────────────

const COUNT_WORDS: Record<string, number> = { no: 0, zero: 0, one: 1, two: 2, three: 3 };

const layoverRules: CriteriaRule[] = [
  {
    name: 'layovers:count',
    pattern:
      /\b(?:(less\s+than|fewer\s+than|under|below)\s+)?(\d+|zero|one|two|three|no)[\s-]+(?:layovers?|stops?|stopovers?|connections?)\b/g,
    effect: (m) => {
      const count = COUNT_WORDS[m[2]] ?? Number(m[2]);
      // strict bound: "fewer than 2 stops" allows at most one
      return { maxLayovers: m[1] ? Math.max(count - 1, 0) : count };
    },
  },
  {
    name: 'layovers:nonstop',
    pattern: /\b(?:non[\s-]?stop|direct)\b/g,
    effect: () => ({ maxLayovers: 0 }),
  },
];

// ── Locations ─────────────────────────────────────────────────────────

/** Words that name a connection city rather than an endpoint ("via Seoul"). */
const VIA = String.raw`via|through|connecting\s+(?:in|at|through)|(?:layover|stopover|stop)\s+in`;

/**
 * Origin/destination rule over a fixed vocabulary (catalog locations). "from X" and "X to"
 * mark the origin, "to X" the destination, and "via X" a connection, which is ignored.
 * A bare mention is the destination.
 */
export function buildLocationRule(locations: readonly string[]): CriteriaRule | null {
  const names = [...new Set(locations.map((l) => l.trim()).filter(Boolean))].sort(
    (a, b) => b.length - a.length || a.localeCompare(b),
  );
  if (names.length === 0) return null;

  const canonical = new Map(names.map((n) => [n.toLowerCase().replace(/\s+/g, ' '), n]));
  return {
    name: 'location',
    pattern: new RegExp(
      `\\b(?:(from|to|${VIA})\\s+)?(${names.map(phrasePattern).join('|').toLowerCase()})\\b(\\s+to\\b)?`,
      'g',
    ),
    effect: (m) => {
      const name = canonical.get(m[2].replace(/[\s-]+/g, ' '));
      if (!name) return null;
      const marker = m[1];
      if (marker === 'from') return { origin: name };
      if (marker === 'to') return { destination: name };
      if (marker) return null;
      return m[3] ? { origin: name } : { destination: name };
    },
  };
}

/** Fixed rules in evaluation order; ties at the same text position apply in this order. */
export const CRITERIA_RULES: readonly CriteriaRule[] = [
  ...allianceRules,
  overnightRule,
  ...monthRules,
  ...priceRules,
  refundableRule,
  ...layoverRules,
];
