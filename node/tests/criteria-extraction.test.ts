import { describe, it, expect } from 'vitest';
import { CriteriaExtractor, extractCriteria } from '@/services/criteria-extraction';
import { resolveMonth } from '@/services/criteria-rules';
import { fixedNow } from './helpers';

const LOCATIONS = ['Dubai', 'Tokyo', 'London', 'Paris', 'Hong Kong', 'Seoul', 'New York', 'Bangkok', 'Helsinki'];

describe('CriteriaExtractor', () => {
  const extractor = new CriteriaExtractor({ locations: LOCATIONS, now: fixedNow });
  const extract = (text: string) => extractor.extract(text);

  it('should read every constraint of a full request', () => {
    expect(
      extract(
        'Find me a round-trip to Tokyo in November with Star Alliance airlines only. I want to avoid overnight layovers.',
      ),
    ).toEqual({
      destination: 'Tokyo',
      departure: { month: 11, year: 2026 },
      alliance: 'Star Alliance',
      avoidOvernightLayover: true,
    });
  });

  it('should read a comma-separated list of constraints and nothing else', () => {
    expect(extract('avoid overnight layovers, Star Alliance only, under $900')).toEqual({
      avoidOvernightLayover: true,
      alliance: 'Star Alliance',
      maxPrice: 900,
    });
  });

  it('should return empty criteria for blank input', () => {
    expect(extract('')).toEqual({});
    expect(extract('   ')).toEqual({});
  });

  it('should leave everything unconstrained when nothing is recognised', () => {
    expect(extract('hello there, anything good?')).toEqual({});
  });

  describe('overnight layovers', () => {
    it('should set the flag only when a negation cue precedes "overnight"', () => {
      expect(extract('without an overnight layover')).toEqual({ avoidOvernightLayover: true });
      expect(extract("I don't want overnight stops")).toEqual({ avoidOvernightLayover: true });
      expect(extract('no overnight layovers please')).toEqual({ avoidOvernightLayover: true });
    });

    it('should not set the flag for a bare mention', () => {
      expect(extract('overnight layovers are fine')).toEqual({});
      expect(extract('I am okay with an overnight stay')).toEqual({});
    });

    it('should ignore a negation cue in an earlier clause', () => {
      expect(extract('no rush, overnight layovers are fine')).toEqual({});
      expect(extract('not picky but overnight is fine')).toEqual({});
    });

    it('should ignore a negation cue more than four tokens back', () => {
      expect(extract('avoid flights that have any overnight layover')).toEqual({});
      expect(extract('avoid flights with overnight layover')).toEqual({ avoidOvernightLayover: true });
    });

    it('should not treat "don\'t mind" as a negation', () => {
      expect(extract("I don't mind an overnight layover")).toEqual({});
      expect(extract('never mind overnight layovers')).toEqual({});
    });
  });

  describe('months', () => {
    it('should resolve a month to its next occurrence', () => {
      expect(extract('flights in March')).toEqual({ departure: { month: 3, year: 2027 } });
      expect(extract('something in October')).toEqual({ departure: { month: 10, year: 2026 } });
      expect(extract('around sept')).toEqual({ departure: { month: 9, year: 2027 } });
    });

    it('should use an explicit year', () => {
      expect(extract('December 2027 please')).toEqual({ departure: { month: 12, year: 2027 } });
      expect(extract('jan, 2028')).toEqual({ departure: { month: 1, year: 2028 } });
    });

    it('should only read "may" as a month after a preposition or before a year', () => {
      expect(extract('I may fly to Paris')).toEqual({ destination: 'Paris' });
      expect(extract('sometime in May')).toEqual({ departure: { month: 5, year: 2027 } });
      expect(extract('may 2027')).toEqual({ departure: { month: 5, year: 2027 } });
    });

    it('should resolve "this month" and "next month" against the reference date', () => {
      expect(extract('this month')).toEqual({ departure: { month: 10, year: 2026 } });
      expect(extract('next month')).toEqual({ departure: { month: 11, year: 2026 } });

      const december = new CriteriaExtractor({ now: () => new Date('2026-12-05T00:00:00Z') });
      expect(december.extract('next month')).toEqual({ departure: { month: 1, year: 2027 } });
    });

    it('should let the later month win', () => {
      expect(extract('March or maybe April')).toEqual({ departure: { month: 4, year: 2027 } });
    });
  });

  describe('price', () => {
    it('should read a price bound with or without a currency', () => {
      expect(extract('under $900')).toEqual({ maxPrice: 900 });
      expect(extract('below 750')).toEqual({ maxPrice: 750 });
      expect(extract('budget of 1,200 dollars')).toEqual({ maxPrice: 1200 });
      expect(extract('no more than USD 640.50')).toEqual({ maxPrice: 640.5 });
      expect(extract('around $800')).toEqual({ maxPrice: 800 });
    });

    it('should not read counts of other things as a price', () => {
      expect(extract('up to 2 layovers')).toEqual({ maxLayovers: 2 });
      expect(extract('under 3 days')).toEqual({});
    });

    it('should keep the last price mentioned', () => {
      expect(extract('under 900, actually under 700')).toEqual({ maxPrice: 700 });
    });
  });

  describe('refundable', () => {
    it('should require refundable fares when asked', () => {
      expect(extract('refundable tickets only')).toEqual({ refundableOnly: true });
    });

    it('should not constrain for non-refundable mentions', () => {
      expect(extract('non-refundable is fine')).toEqual({});
      expect(extract('not refundable is ok')).toEqual({});
    });

    it('should not constrain when a negation cue precedes "refundable" in the same clause', () => {
      expect(extract("I don't need a refundable ticket")).toEqual({});
      expect(extract('Tokyo flights without refundable fares')).toEqual({ destination: 'Tokyo' });
    });

    it('should ignore a negation cue in an earlier clause', () => {
      expect(extract('no rush, refundable only')).toEqual({ refundableOnly: true });
    });

    it('should clear an earlier request when a later mention negates it', () => {
      expect(extract('refundable, or non-refundable if cheaper')).toEqual({});
    });
  });

  describe('layovers', () => {
    it('should read nonstop and counted layovers', () => {
      expect(extract('nonstop please')).toEqual({ maxLayovers: 0 });
      expect(extract('direct flights')).toEqual({ maxLayovers: 0 });
      expect(extract('no layovers')).toEqual({ maxLayovers: 0 });
      expect(extract('one stop is ok')).toEqual({ maxLayovers: 1 });
    });

    it('should treat "less than" and "fewer than" as strict bounds', () => {
      expect(extract('less than 2 layovers')).toEqual({ maxLayovers: 1 });
      expect(extract('fewer than two stops')).toEqual({ maxLayovers: 1 });
      expect(extract('under 1 connection')).toEqual({ maxLayovers: 0 });
    });
  });

  describe('alliances', () => {
    it('should map member airlines to their alliance', () => {
      expect(extract('something on Lufthansa')).toEqual({ alliance: 'Star Alliance' });
      expect(extract('KLM or similar')).toEqual({ alliance: 'SkyTeam' });
      expect(extract('one-world carriers')).toEqual({ alliance: 'Oneworld' });
    });

    it('should keep the last alliance mentioned', () => {
      expect(extract('Star Alliance or perhaps Oneworld')).toEqual({ alliance: 'Oneworld' });
    });
  });

  describe('locations', () => {
    it('should tell origin from destination', () => {
      expect(extract('flights from London to Helsinki')).toEqual({ origin: 'London', destination: 'Helsinki' });
      expect(extract('Paris to Dubai')).toEqual({ origin: 'Paris', destination: 'Dubai' });
      expect(extract('going to hong kong')).toEqual({ destination: 'Hong Kong' });
    });

    it('should ignore connection cities', () => {
      expect(extract('flights to Tokyo via Seoul')).toEqual({ destination: 'Tokyo' });
      expect(extract('London to Tokyo connecting in Helsinki')).toEqual({ origin: 'London', destination: 'Tokyo' });
      expect(extract('to Bangkok with a layover in Dubai')).toEqual({ destination: 'Bangkok' });
    });

    it('should extract no location without a vocabulary', () => {
      expect(extractCriteria('to Tokyo under $900', { now: fixedNow })).toEqual({ maxPrice: 900 });
    });
  });
});

describe('resolveMonth', () => {
  const ref = new Date('2026-10-18T00:00:00Z');

  it('should keep the current month in the current year', () => {
    expect(resolveMonth(10, ref)).toEqual({ month: 10, year: 2026 });
  });

  it('should move past months to next year', () => {
    expect(resolveMonth(9, ref)).toEqual({ month: 9, year: 2027 });
  });

  it('should respect an explicit year', () => {
    expect(resolveMonth(2, ref, 2026)).toEqual({ month: 2, year: 2026 });
  });
});
