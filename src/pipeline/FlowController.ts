/**
* FlowController.ts
*
* Runs one generate → validate → store pass as an explicit state machine:
*
* ```
* Idle ─start─▶ Generating ─ok─▶ Validating ─non-empty─▶ Storing ─ok─▶ Completed
*                   │                 │                      │
*                   └─────────────────┴──────────────────────┴──▶ Failed
* ```
*
* Each remote step owns its own retry scope; the controller never repeats a
* step. A failure stops the run before the next step starts, so a generation
* failure cannot produce a write and a storage failure cannot trigger a new
* generation.
*/

import {
  EmptyOutputError,
  GenerationError,
  PipelineError,
  StorageError,
  toGenerationError,
  toStorageError,
} from '../errors';
import { WriteResult } from '../integrations/googleSheets';
import * as logger from '../utils/logger';
import { ValidatedPrompt, validatePrompt } from './validatePrompt';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FlowState = 'Idle' | 'Generating' | 'Validating' | 'Storing' | 'Completed' | 'Failed';

export type FailedStep = 'Generating' | 'Validating' | 'Storing';

export interface PromptSource {
  generate(): Promise<string>;
}

export interface PromptSink {
  append(prompt: ValidatedPrompt): Promise<WriteResult>;
}

export type FlowResult =
  | { state: 'Completed'; prompt: ValidatedPrompt; write: WriteResult }
  | { state: 'Failed'; failedAt: FailedStep; error: PipelineError };

export interface FlowControllerOptions {
  generator: PromptSource;
  writer: PromptSink;
  /** Literal secrets scrubbed from errors the steps did not sanitise themselves. */
  secrets?: readonly string[];
}

const TRANSITIONS: Record<FlowState, readonly FlowState[]> = {
  Idle: ['Generating'],
  Generating: ['Validating', 'Failed'],
  Validating: ['Storing', 'Failed'],
  Storing: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class FlowController {
  private current: FlowState = 'Idle';
  private readonly visited: FlowState[] = ['Idle'];

  constructor(private readonly opts: FlowControllerOptions) {}

  get state(): FlowState {
    return this.current;
  }

  /** Every state the controller has been in, oldest first. */
  get history(): readonly FlowState[] {
    return this.visited;
  }

  /**
  * Execute the pipeline once. Never rejects for step failures – they are
  * reported through the `Failed` result.
  *
  * @throws {Error} When called on a controller that already ran.
  */
  async run(): Promise<FlowResult> {
    if (this.current !== 'Idle') {
      throw new Error(`FlowController.run() called in state ${this.current}; a controller runs once`);
    }

    this.transition('Generating');
    let raw: string;
    try {
      raw = await this.opts.generator.generate();
    } catch (err) {
      return this.fail('Generating', this.asGenerationError(err));
    }

    this.transition('Validating');
    let prompt: ValidatedPrompt;
    try {
      prompt = validatePrompt(raw);
    } catch (err) {
      return this.fail('Validating', err instanceof EmptyOutputError ? err : new EmptyOutputError());
    }

    this.transition('Storing');
    let write: WriteResult;
    try {
      write = await this.opts.writer.append(prompt);
    } catch (err) {
      return this.fail('Storing', this.asStorageError(err));
    }

    this.transition('Completed');
    logger.info('Flow completed', { updatedRange: write.updatedRange });
    return { state: 'Completed', prompt, write };
  }

  // -------------------------------------------------------------------------

  private transition(next: FlowState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal flow transition ${this.current} → ${next}`);
    }
    logger.debug('Flow state changed', { from: this.current, to: next });
    this.current = next;
    this.visited.push(next);
  }

  private fail(step: FailedStep, error: PipelineError): FlowResult {
    this.transition('Failed');
    logger.error('Flow halted', {
      failedAt: step,
      error: error.name,
      category: error.category,
      attempts: error.attempts,
      reason: error.message,
    });
    return { state: 'Failed', failedAt: step, error };
  }

  private asGenerationError(err: unknown): GenerationError {
    return toGenerationError(err, { attempts: 1, secrets: this.opts.secrets });
  }

  private asStorageError(err: unknown): StorageError {
    return toStorageError(err, { attempts: 1, secrets: this.opts.secrets });
  }
}

/** Process exit code for a terminal flow result. */
export function exitCodeFor(result: FlowResult): number {
  return result.state === 'Completed' ? 0 : 1;
}
