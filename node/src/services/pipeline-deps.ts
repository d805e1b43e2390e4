// src/services/pipeline-deps.ts — wires catalog, index and models once for the HTTP server and the CLI
import type { AppConfig } from '@/config/app.config';
import type { TextGenerator } from '@/models/base/llm';
import { createEmbedding } from '@/models/embeddings';
import { createTextGenerator } from '@/models/llms';
import type { Embedder } from './providers/retrieval-vector-utils';
import { FlightCatalog } from './providers/flights/flight-catalog';
import { CriteriaExtractor } from './criteria-extraction';
import { buildOrLoadIndex, readPolicyDocuments } from './index-store';
import { AnswerSynthesizer } from './answer-synthesizer';
import { TravelAssistant } from './travel-assistant';
import { CapabilityDispatcher } from './capability-dispatcher';

export interface PipelineDeps {
  assistant: TravelAssistant;
  dispatcher: CapabilityDispatcher;
}

export interface PipelineOverrides {
  embedder?: Embedder;
  generator?: TextGenerator;
  now?: () => Date;
  /** Ignore any saved vector store and rebuild it. */
  rebuildIndex?: boolean;
}

/**
 * Load the catalog, build (or reload) the policy index and construct both pipelines.
 * Fails fast with DataError/ConfigurationError; nothing is retried.
 */
export async function createPipelineDeps(
  config: AppConfig,
  overrides: PipelineOverrides = {},
): Promise<PipelineDeps> {
  const catalog = FlightCatalog.loadFromFile(config.flightsFile);
  const extractor = new CriteriaExtractor({ locations: catalog.locations(), now: overrides.now });

  const embedder = overrides.embedder ?? createEmbedding(config);
  const index = await buildOrLoadIndex({
    documents: readPolicyDocuments(config.policyFiles),
    chunking: config.chunking,
    embedder,
    storePath: config.vectorStorePath,
    rebuild: overrides.rebuildIndex,
  });

  const synthesizer = new AnswerSynthesizer(overrides.generator ?? createTextGenerator(config));
  const assistant = new TravelAssistant({
    catalog,
    extractor,
    index,
    synthesizer,
    topK: config.retrievalTopK,
  });
  return { assistant, dispatcher: new CapabilityDispatcher(assistant, config.maxDisplayedFlights) };
}
