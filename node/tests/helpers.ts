// Shared builders and in-process stand-ins for the model calls.
import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type AppConfig } from '@/config/app.config';
import HashingEmbedding from '@/models/embeddings/hashing';
import { createPipelineDeps, type PipelineDeps } from '@/services/pipeline-deps';
import type { TextGenerator } from '@/models/base/llm';
import type { Embedder, Embedding } from '@/services/providers/retrieval-vector-utils';
import type { FlightRecord } from '@/types/flights';
import type { PolicyChunk } from '@/types/policy';

export const ROOT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');
export const DATA_DIR = path.join(ROOT_DIR, 'data');

/** "Today" for every month-resolution test. */
export const REFERENCE_DATE = new Date('2026-10-18T00:00:00Z');
export const fixedNow = (): Date => REFERENCE_DATE;

export function makeFlight(overrides: Partial<FlightRecord> & { id: string }): FlightRecord {
  return {
    origin: 'Dubai',
    destination: 'Tokyo',
    departureDate: '2026-11-10',
    returnDate: '2026-11-20',
    airline: 'Test Air',
    alliance: 'None',
    layovers: [],
    overnightLayover: false,
    price: 1000,
    refundable: false,
    ...overrides,
  };
}

/** Raw catalog entry in the on-disk snake_case shape. */
export function makeCatalogEntry(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    flight_id: 'FL100',
    airline: 'Test Air',
    alliance: 'None',
    from: 'Dubai',
    to: 'Tokyo',
    departure_date: '2026-11-10',
    return_date: '2026-11-20',
    layovers: [],
    overnight_layover: false,
    price_usd: 1000,
    refundable: false,
    ...overrides,
  };
}

export function makeChunk(index: number, text: string, source = 'policy.md'): PolicyChunk {
  return { index, source, text, start: index * 10, end: index * 10 + text.length };
}

/** Returns a fixed vector per known text and a zero vector otherwise. */
export class TableEmbedder implements Embedder {
  readonly id: string;
  readonly calls: string[] = [];

  constructor(
    private readonly table: Record<string, Embedding>,
    private readonly dimensions = 2,
    id = 'table',
  ) {
    this.id = id;
  }

  async embed(text: string): Promise<Embedding> {
    this.calls.push(text);
    return this.table[text] ?? Array.from({ length: this.dimensions }, () => 0);
  }
}

export class FailingEmbedder implements Embedder {
  readonly id = 'failing';

  async embed(): Promise<Embedding> {
    throw new Error('embedding service unavailable');
  }
}

/** Records every prompt and answers with a canned reply. */
export class RecordingGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | ((prompt: string) => string) = 'canned answer') {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return typeof this.reply === 'function' ? this.reply(prompt) : this.reply;
  }
}

export class FailingGenerator implements TextGenerator {
  async generate(): Promise<string> {
    throw new Error('rate limited');
  }
}

/** Run `fn` and return what it threw. */
export async function caught(fn: () => unknown): Promise<unknown> {
  try {
    await fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error to be thrown');
}

export interface TestPipeline<G extends TextGenerator = RecordingGenerator> extends PipelineDeps {
  config: AppConfig;
  generator: G;
  cleanup(): void;
}

/** Bundled catalog and policy file, hashing embeddings, the given generator and a throwaway store. */
export async function createTestPipeline<G extends TextGenerator>(
  generator: G,
  env: Record<string, string> = {},
): Promise<TestPipeline<G>> {
  const storeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'travel-assistant-'));
  const config = loadConfig({ VECTOR_STORE_PATH: path.join(storeDir, 'index.json'), ...env }, ROOT_DIR);
  const deps = await createPipelineDeps(config, { embedder: new HashingEmbedding(), generator, now: fixedNow });
  return {
    ...deps,
    config,
    generator,
    cleanup: () => fs.rmSync(storeDir, { recursive: true, force: true }),
  };
}
