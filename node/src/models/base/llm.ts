/**
 * Opaque text generation: prompt in, text out. The answer synthesizer depends on
 * this interface only, so tests and alternative providers can stand in for the SDK.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

abstract class BaseLLM<CONFIG> implements TextGenerator {
  constructor(protected config: CONFIG) {}

  /**
   * Generate a completion for a single user prompt.
   * @returns the model's text, unmodified
   */
  abstract generate(prompt: string): Promise<string>;
}

export default BaseLLM;
