// src/types/flights.ts

export const ALLIANCES = ['Star Alliance', 'Oneworld', 'SkyTeam', 'None'] as const;
export type Alliance = (typeof ALLIANCES)[number];

/** One row of the static flight catalog. Prices are USD. */
export interface FlightRecord {
  readonly id: string;
  readonly origin: string;
  readonly destination: string;
  readonly departureDate: string; // YYYY-MM-DD
  /** Absent for one-way fares. */
  readonly returnDate?: string; // YYYY-MM-DD
  readonly airline: string;
  readonly alliance: Alliance;
  /** Connection points in travel order; empty = nonstop. */
  readonly layovers: readonly string[];
  readonly overnightLayover: boolean;
  readonly price: number;
  readonly refundable: boolean;
}

export interface MonthWindow {
  month: number; // 1-12
  year: number;
}

/**
 * Structured constraints for one search. Every field is independent; an absent field
 * means "no filter on this dimension".
 */
export interface SearchCriteria {
  origin?: string;
  destination?: string;
  departure?: MonthWindow;
  alliance?: Alliance;
  /** Only accepted through structured input; the text extractor never sets it. */
  airline?: string;
  maxPrice?: number;
  refundableOnly?: boolean;
  avoidOvernightLayover?: boolean;
  maxLayovers?: number;
}

export interface FlightSearchResult {
  criteria: SearchCriteria;
  flights: FlightRecord[];
}
