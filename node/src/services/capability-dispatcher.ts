// src/services/capability-dispatcher.ts
// Route free text to flight search or policy Q&A and shape the reply so that filtered, unfiltered,
// empty and answered cases read differently to the user.
import type { FlightRecord, SearchCriteria } from '@/types/flights';
import type { RetrievalResult } from '@/types/policy';
import type { TravelAssistant } from './travel-assistant';
import { describeCriteria, isUnconstrained } from './search-criteria';
import { formatFlightsList } from '@/utils/formatFlights';
import { logger } from './logger';

export type Capability = 'flight_search' | 'policy_search';

export type DispatchResult =
  | {
      capability: 'flight_search';
      outcome: 'matches' | 'no_matches';
      /** False when no constraint was recognised and the whole catalog is listed. */
      filtered: boolean;
      criteria: SearchCriteria;
      flights: FlightRecord[];
      message: string;
    }
  | {
      capability: 'policy_search';
      outcome: 'answered' | 'no_context';
      answer: string;
      passages: RetrievalResult;
      message: string;
    };

const POLICY_CUES: readonly RegExp[] = [
  /\bvisas?\b/, /\bpassports?\b/, /\bpolic(?:y|ies)\b/, /\brefund\s+(?:policy|rules?)\b/,
  /\bcancell?(?:ation|ing|ed)?\b/, /\btransit\b/, /\binsurance\b/, /\bbenefits?\b/,
  /\brequire(?:d|ments?)?\b/, /\bregulations?\b/, /\ballowed\b/, /\bvalidity\b/, /\bentry\b/,
  /\b(?:eta|esta)\b/, /\blounge\b/, /\bbaggage\b/, /\bhealth\b/, /\bneed\s+an?\b/,
];

const FLIGHT_CUES: readonly RegExp[] = [
  /\bflights?\b/, /\bfly(?:ing)?\b/, /\btickets?\b/, /\bnon[\s-]?stop\b/, /\bdirect\b/,
  /\blayovers?\b/, /\bround[\s-]?trip\b/, /\bone[\s-]?way\b/, /\bcheap(?:est|er)?\b/,
  /\b(?:under|below|less\s+than)\s+\$?\d/, /\bbook(?:ing)?\b/, /\bdepart(?:ing|ure)?\b/,
  /\bfrom\s+\w+\s+to\s+\w+/,
];

const INTERROGATIVE = /^(?:do|does|did|is|are|can|could|should|what|which|when|where|how|who|why|will|would|must)\b/;

function countCues(text: string, cues: readonly RegExp[]): number {
  return cues.reduce((n, cue) => (cue.test(text) ? n + 1 : n), 0);
}

/** Higher cue count wins; ties go to policy for questions and to flights otherwise. */
export function routeQuery(text: string): Capability {
  const lower = text.trim().toLowerCase();
  const policy = countCues(lower, POLICY_CUES);
  const flight = countCues(lower, FLIGHT_CUES);
  if (policy !== flight) return policy > flight ? 'policy_search' : 'flight_search';
  const isQuestion = lower.endsWith('?') || INTERROGATIVE.test(lower);
  return isQuestion ? 'policy_search' : 'flight_search';
}

export class CapabilityDispatcher {
  constructor(
    private readonly assistant: TravelAssistant,
    private readonly maxDisplayedFlights = 5,
  ) {}

  async dispatch(text: string, capability: Capability = routeQuery(text)): Promise<DispatchResult> {
    logger.debug('dispatch', { capability });
    if (capability === 'flight_search') return this.flights(text);
    return this.policy(text);
  }

  private flights(text: string): DispatchResult {
    const { criteria, flights } = this.assistant.searchFlights(text);
    const filtered = !isUnconstrained(criteria);
    const header = filtered
      ? `Searching flights: ${describeCriteria(criteria)}.`
      : 'No search filters recognised in your request; showing all flights.';
    return {
      capability: 'flight_search',
      outcome: flights.length > 0 ? 'matches' : 'no_matches',
      filtered,
      criteria,
      flights,
      message: `${header}\n${formatFlightsList(flights, this.maxDisplayedFlights)}`,
    };
  }

  private async policy(text: string): Promise<DispatchResult> {
    const { answer, passages } = await this.assistant.answerPolicyQuestion(text);
    return {
      capability: 'policy_search',
      outcome: passages.length > 0 ? 'answered' : 'no_context',
      answer,
      passages,
      message: passages.length > 0 ? answer : `${answer}\n(No matching policy passages were found.)`,
    };
  }
}
