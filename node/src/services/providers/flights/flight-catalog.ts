// src/services/providers/flights/flight-catalog.ts
// Static flight catalog: validated once at load, read-only afterwards.
import fs from 'fs';
import { z } from 'zod';
import { ALLIANCES, type FlightRecord } from '@/types/flights';
import { DataError } from '@/utils/errors';
import { logger } from '@/services/logger';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date')
  .refine((s) => {
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
  }, 'not a calendar date');

/** On-disk record shape (snake_case, as stored in data/flights.json). */
const catalogRecordSchema = z.object({
  flight_id: z.string().trim().min(1),
  airline: z.string().trim().min(1),
  alliance: z.enum(ALLIANCES),
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  departure_date: isoDate,
  return_date: isoDate.nullish(),
  layovers: z.array(z.string().trim().min(1)),
  overnight_layover: z.boolean(),
  price_usd: z.number().finite().positive(),
  refundable: z.boolean(),
});

export type CatalogRecord = z.infer<typeof catalogRecordSchema>;

function toFlightRecord(raw: CatalogRecord): FlightRecord {
  const record: FlightRecord = {
    id: raw.flight_id,
    origin: raw.from,
    destination: raw.to,
    departureDate: raw.departure_date,
    ...(raw.return_date ? { returnDate: raw.return_date } : {}),
    airline: raw.airline,
    alliance: raw.alliance,
    layovers: Object.freeze([...raw.layovers]),
    overnightLayover: raw.overnight_layover,
    price: raw.price_usd,
    refundable: raw.refundable,
  };
  return Object.freeze(record);
}

function recordLabel(raw: unknown, position: number): string {
  if (raw && typeof raw === 'object' && 'flight_id' in raw) {
    const id = raw.flight_id;
    if (typeof id === 'string' && id.trim() !== '') return id;
  }
  return `#${position}`;
}

export class FlightCatalog {
  private readonly records: readonly FlightRecord[];
  private readonly byId: ReadonlyMap<string, FlightRecord>;

  private constructor(records: FlightRecord[]) {
    this.records = Object.freeze(records);
    this.byId = new Map(records.map((r) => [r.id, r]));
  }

  /**
   * Validate raw catalog entries. Throws DataError naming the record and field of the first problem.
   */
  static fromRecords(input: unknown): FlightCatalog {
    if (!Array.isArray(input)) {
      throw new DataError('catalog must be a JSON array of flight records');
    }

    const records: FlightRecord[] = [];
    const seen = new Set<string>();
    input.forEach((raw: unknown, position) => {
      const label = recordLabel(raw, position);
      const parsed = catalogRecordSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new DataError(issue.message, label, issue.path.join('.') || undefined);
      }
      const data = parsed.data;
      if (seen.has(data.flight_id)) {
        throw new DataError('duplicate flight id', label, 'flight_id');
      }
      if (data.return_date && data.return_date <= data.departure_date) {
        throw new DataError('must be after departure_date', label, 'return_date');
      }
      if (data.overnight_layover && data.layovers.length === 0) {
        throw new DataError('nonstop flight cannot have an overnight layover', label, 'overnight_layover');
      }
      seen.add(data.flight_id);
      records.push(toFlightRecord(data));
    });

    return new FlightCatalog(records);
  }

  static loadFromFile(filePath: string): FlightCatalog {
    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new DataError(`cannot read flight catalog ${filePath}`, undefined, undefined, { cause: err });
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new DataError(`invalid JSON in ${filePath}`, undefined, undefined, { cause: err });
    }
    const catalog = FlightCatalog.fromRecords(json);
    logger.info('flight catalog loaded', { file: filePath, flights: catalog.size });
    return catalog;
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly FlightRecord[] {
    return this.records;
  }

  get(id: string): FlightRecord | undefined {
    return this.byId.get(id);
  }

  /** Distinct origin and destination names, longest first (so "New York" wins over "York"). */
  locations(): string[] {
    const names = new Set<string>();
    for (const r of this.records) {
      names.add(r.origin);
      names.add(r.destination);
    }
    return [...names].sort((a, b) => b.length - a.length || a.localeCompare(b));
  }
}
