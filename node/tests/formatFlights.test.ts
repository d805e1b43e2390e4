import { describe, it, expect } from 'vitest';
import { NO_FLIGHTS_MESSAGE, formatFlight, formatFlightsList } from '@/utils/formatFlights';
import { makeFlight } from './helpers';

describe('formatFlight', () => {
  it('should print a round trip with an overnight layover', () => {
    const flight = makeFlight({
      id: 'FL003',
      airline: 'Singapore Airlines',
      alliance: 'Star Alliance',
      layovers: ['Singapore'],
      overnightLayover: true,
      departureDate: '2026-11-20',
      returnDate: '2026-12-04',
      price: 780,
    });

    expect(formatFlight(flight)).toBe(
      [
        'Flight FL003:',
        '  Airline: Singapore Airlines (Star Alliance)',
        '  Route: Dubai → Tokyo',
        '  Layovers: Singapore (overnight)',
        '  Dates: 2026-11-20 to 2026-12-04',
        '  Price: $780 USD',
        '  Refundable: No',
      ].join('\n'),
    );
  });

  it('should print a nonstop one-way flight', () => {
    const flight = makeFlight({ id: 'FL014', returnDate: undefined, refundable: true, price: 210 });
    const lines = formatFlight(flight).split('\n');

    expect(lines[3]).toBe('  Layovers: none (nonstop)');
    expect(lines[4]).toBe('  Dates: 2026-11-10 (one-way)');
    expect(lines[6]).toBe('  Refundable: Yes');
  });
});

describe('formatFlightsList', () => {
  it('should say when nothing matched', () => {
    expect(formatFlightsList([])).toBe(NO_FLIGHTS_MESSAGE);
  });

  it('should show at most the limit and note the truncation', () => {
    const flights = ['A', 'B', 'C'].map((id) => makeFlight({ id }));
    const text = formatFlightsList(flights, 2);
    const lines = text.split('\n');

    expect(lines[0]).toBe('Found 3 flight(s):');
    expect(lines[1]).toBe('='.repeat(50));
    expect(lines[2]).toBe('Flight A:');
    expect(text).toContain('Flight B:');
    expect(text).not.toContain('Flight C:');
    expect(lines[lines.length - 1]).toBe('(Showing top 2 of 3 results)');
  });

  it('should not add a footer when everything fits', () => {
    const lines = formatFlightsList([makeFlight({ id: 'A' })]).split('\n');
    expect(lines[lines.length - 1]).toBe('-'.repeat(50));
  });
});
