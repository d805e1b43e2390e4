// src/services/flight-search.ts
// Hard-filter + rank over the catalog. Every present criterion is an independent predicate and a
// flight must pass all of them; there is no partial-match scoring.
import type { FlightRecord, SearchCriteria } from '@/types/flights';

type Predicate = (flight: FlightRecord) => boolean;

function matchesLocation(value: string, wanted: string): boolean {
  const v = value.trim().toLowerCase();
  const w = wanted.trim().toLowerCase();
  return v.startsWith(w);
}

/** Calendar month of a YYYY-MM-DD date, read from the string so no timezone applies. */
function departsIn(date: string, month: number, year: number): boolean {
  const [y, m] = date.split('-').map(Number);
  return y === year && m === month;
}

export function buildPredicates(criteria: SearchCriteria): Predicate[] {
  const predicates: Predicate[] = [];
  const {
    origin,
    destination,
    departure,
    alliance,
    airline,
    maxPrice,
    refundableOnly,
    avoidOvernightLayover,
    maxLayovers,
  } = criteria;

  if (origin !== undefined) predicates.push((f) => matchesLocation(f.origin, origin));
  if (destination !== undefined) predicates.push((f) => matchesLocation(f.destination, destination));
  if (departure !== undefined) {
    predicates.push((f) => departsIn(f.departureDate, departure.month, departure.year));
  }
  if (alliance !== undefined) predicates.push((f) => f.alliance === alliance);
  if (airline !== undefined) {
    predicates.push((f) => f.airline.toLowerCase() === airline.trim().toLowerCase());
  }
  if (maxPrice !== undefined) predicates.push((f) => f.price <= maxPrice);
  if (refundableOnly) predicates.push((f) => f.refundable);
  if (avoidOvernightLayover) predicates.push((f) => !f.overnightLayover);
  if (maxLayovers !== undefined) predicates.push((f) => f.layovers.length <= maxLayovers);

  return predicates;
}

/** Price ascending, then id ascending. */
export function compareFlights(a: FlightRecord, b: FlightRecord): number {
  if (a.price !== b.price) return a.price - b.price;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Filter `catalog` by `criteria` and rank the survivors. Pure: the input is not reordered.
 */
export function searchFlights(catalog: readonly FlightRecord[], criteria: SearchCriteria): FlightRecord[] {
  const predicates = buildPredicates(criteria);
  return catalog.filter((f) => predicates.every((p) => p(f))).sort(compareFlights);
}
