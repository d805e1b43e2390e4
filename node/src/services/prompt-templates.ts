// node/src/services/prompt-templates.ts — grounded policy-answer prompt
import type { RetrievalResult } from '@/types/policy';

/** Passage numbers in prompts are 1-based. */
const PASSAGE_OFFSET = 1;

export const GROUNDING_INSTRUCTION = `Answer the question using ONLY the context passages above.
If the context does not contain enough information to answer, say so explicitly instead of guessing.`;

export const NO_CONTEXT_INSTRUCTION = `No relevant context was found in the knowledge base for this question.
Tell the user that the knowledge base has no information on it. Do not answer from general knowledge.`;

/** Delimiter line opening one retrieved passage. */
export function passageHeader(position: number, source: string): string {
  return `[Passage ${position + PASSAGE_OFFSET}] (source: ${source})`;
}

/**
 * Context block (passages in retrieval order, text verbatim), then the question and the
 * grounding instruction. With nothing retrieved the instruction says so.
 */
export function buildGroundedPrompt(query: string, retrieved: RetrievalResult): string {
  if (retrieved.length === 0) {
    return `Context:
(none)

${NO_CONTEXT_INSTRUCTION}

Question: ${query}

Answer:`;
  }

  const passages = retrieved
    .map(({ chunk }, i) => `${passageHeader(i, chunk.source)}\n${chunk.text}\n[End of Passage ${i + PASSAGE_OFFSET}]`)
    .join('\n\n');

  return `Context:
${passages}

${GROUNDING_INSTRUCTION}

Question: ${query}

Answer:`;
}
