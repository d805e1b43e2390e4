// src/utils/formatFlights.ts — plain-text rendering of search results for chat/CLI replies
import type { FlightRecord } from '@/types/flights';

export const NO_FLIGHTS_MESSAGE = 'No flights found matching your criteria.';

const RULE = '-'.repeat(50);

export function formatFlight(flight: FlightRecord): string {
  const lines = [
    `Flight ${flight.id}:`,
    `  Airline: ${flight.airline} (${flight.alliance})`,
    `  Route: ${flight.origin} → ${flight.destination}`,
  ];
  if (flight.layovers.length > 0) {
    lines.push(`  Layovers: ${flight.layovers.join(', ')}${flight.overnightLayover ? ' (overnight)' : ''}`);
  } else {
    lines.push('  Layovers: none (nonstop)');
  }
  lines.push(
    `  Dates: ${flight.departureDate}${flight.returnDate ? ` to ${flight.returnDate}` : ' (one-way)'}`,
    `  Price: $${flight.price} USD`,
    `  Refundable: ${flight.refundable ? 'Yes' : 'No'}`,
  );
  return lines.join('\n');
}

/** At most `maxResults` flights, with a "Showing top N of M" footer when truncated. */
export function formatFlightsList(flights: readonly FlightRecord[], maxResults = 5): string {
  if (flights.length === 0) return NO_FLIGHTS_MESSAGE;

  const shown = flights.slice(0, maxResults);
  const out = [`Found ${flights.length} flight(s):`, '='.repeat(50)];
  for (const flight of shown) {
    out.push(formatFlight(flight), RULE);
  }
  if (flights.length > shown.length) {
    out.push(`(Showing top ${shown.length} of ${flights.length} results)`);
  }
  return out.join('\n');
}
