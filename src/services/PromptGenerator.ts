/**
* PromptGenerator.ts
*
* Asks the configured model for one image prompt, with the shared retry
* policy around the call. The text comes back exactly as the provider sent
* it; emptiness is judged later by the validation gate.
*/

import { LlmConfig } from '../config';
import { classifyFailure, GenerationError, isTransientFailure, toGenerationError } from '../errors';
import { generateText, GenerateTextOptions } from '../llm';
import { ART_DIRECTOR_INSTRUCTION, GENERATE_REQUEST } from '../llm/prompts';
import * as logger from '../utils/logger';
import { RetryError, RetryPolicy, withRetry } from '../utils/retry';

export type GenerateTextFn = (prompt: string, opts: GenerateTextOptions) => Promise<string>;

export interface PromptGeneratorDeps {
  /** Defaults to the real provider wrapper. */
  generateText?: GenerateTextFn;
  sleep?: (ms: number) => Promise<void>;
}

export class PromptGenerator {
  private readonly callModel: GenerateTextFn;

  constructor(
    private readonly llm: LlmConfig,
    private readonly retry: RetryPolicy,
    private readonly deps: PromptGeneratorDeps = {},
  ) {
    this.callModel = deps.generateText ?? generateText;
  }

  /**
  * @throws {GenerationError} When every attempt failed or the failure was
  * not worth retrying.
  */
  async generate(): Promise<string> {
    const opts: GenerateTextOptions = {
      provider: this.llm.provider,
      apiKey: this.llm.apiKey,
      modelId: this.llm.modelId,
      endpoint: this.llm.endpoint,
      temperature: this.llm.temperature,
      timeoutMs: this.llm.timeoutMs,
      systemInstruction: ART_DIRECTOR_INSTRUCTION,
    };

    try {
      const text = await withRetry(() => this.callModel(GENERATE_REQUEST, opts), {
        ...this.retry,
        isRetryable: isTransientFailure,
        sleep: this.deps.sleep,
        onRetry: ({ attempt, error, delayMs }) =>
          logger.warn('Prompt generation attempt failed – retrying', {
            attempt,
            category: classifyFailure(error),
            delayMs,
          }),
      });

      logger.debug('Prompt generated', { provider: this.llm.provider, length: text.length });
      return text;
    } catch (err) {
      throw this.toError(err);
    }
  }

  private toError(err: unknown): GenerationError {
    const secrets = [this.llm.apiKey];
    if (err instanceof RetryError) {
      return toGenerationError(err.lastError, { attempts: err.attempts, secrets });
    }
    return toGenerationError(err, { attempts: 1, secrets });
  }
}
