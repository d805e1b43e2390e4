// src/services/travel-assistant.ts
// The two entry points the dispatcher calls: flight search (extract + filter/rank) and policy
// answers (retrieve + synthesize). Both read immutable state built at startup.
import type { FlightRecord, FlightSearchResult, SearchCriteria } from '@/types/flights';
import type { PolicyAnswer } from '@/types/policy';
import type { FlightCatalog } from './providers/flights/flight-catalog';
import type { CriteriaExtractor } from './criteria-extraction';
import type { EmbeddingIndex } from './embedding-index';
import type { AnswerSynthesizer } from './answer-synthesizer';
import { searchFlights } from './flight-search';
import { DEFAULT_TOP_K } from './embedding-index';
import { logger } from './logger';

export interface TravelAssistantDeps {
  catalog: FlightCatalog;
  extractor: CriteriaExtractor;
  index: EmbeddingIndex;
  synthesizer: AnswerSynthesizer;
  /** Passages retrieved per question. */
  topK?: number;
}

export class TravelAssistant {
  private readonly topK: number;

  constructor(private readonly deps: TravelAssistantDeps) {
    this.topK = deps.topK ?? DEFAULT_TOP_K;
  }

  get catalog(): FlightCatalog {
    return this.deps.catalog;
  }

  /** Criteria extracted from `text` and the flights that satisfy them. */
  searchFlights(text: string): FlightSearchResult {
    const criteria = this.deps.extractor.extract(text);
    const flights = this.searchWithCriteria(criteria);
    logger.debug('flight search', { criteria, matches: flights.length });
    return { criteria, flights };
  }

  searchWithCriteria(criteria: SearchCriteria): FlightRecord[] {
    return searchFlights(this.deps.catalog.all(), criteria);
  }

  flightSearch(text: string): FlightRecord[] {
    return this.searchFlights(text).flights;
  }

  /** Retrieved passages and the answer grounded in them. */
  async answerPolicyQuestion(question: string, k: number = this.topK): Promise<PolicyAnswer> {
    const passages = await this.deps.index.retrieve(question, k);
    logger.debug('policy retrieval', {
      passages: passages.map((p) => ({ index: p.chunk.index, score: Number(p.score.toFixed(4)) })),
    });
    const answer = await this.deps.synthesizer.synthesize(question, passages);
    return { answer, passages };
  }

  async policyAnswer(question: string): Promise<string> {
    return (await this.answerPolicyQuestion(question)).answer;
  }
}
