/**
* Job entry point: one generate → validate → store run per invocation.
*
* `main()` owns the process-level boundaries – configuration is loaded and
* validated once, handed to the components explicitly, and the shared state
* (log settings, cached Sheets client) is torn down before returning.
*/

import { AppConfig, loadConfig, secretsOf } from './config';
import { messageOf } from './errors';
import { resetSheetsClient } from './integrations/googleSheets';
import { exitCodeFor, FlowController } from './pipeline/FlowController';
import { PromptGenerator, PromptGeneratorDeps } from './services/PromptGenerator';
import { QueueWriter, QueueWriterDeps } from './services/QueueWriter';
import * as logger from './utils/logger';
import { redactSecrets } from './utils/redact';

export interface MainDeps {
  generator?: PromptGeneratorDeps;
  writer?: QueueWriterDeps;
}

/**
* Run the job once and resolve to the process exit code (`0` completed,
* `1` failed). Never rejects.
*/
export async function main(env: NodeJS.ProcessEnv = process.env, deps: MainDeps = {}): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    logger.error('Configuration invalid', { reason: redactSecrets(messageOf(err)) });
    return 1;
  }

  const secrets = secretsOf(config);
  logger.registerSecrets(secrets);
  logger.setLogLevel(config.logLevel);

  try {
    logger.info('Image prompt flow starting', {
      provider: config.llm.provider,
      worksheet: config.sheets.worksheet,
      attempts: config.retry.attempts,
    });

    const controller = new FlowController({
      generator: new PromptGenerator(config.llm, config.retry, deps.generator),
      writer: new QueueWriter(config.sheets, config.retry, { secrets, ...deps.writer }),
      secrets,
    });

    return exitCodeFor(await controller.run());
  } catch (err) {
    logger.error('Image prompt flow crashed', { reason: redactSecrets(messageOf(err), secrets) });
    return 1;
  } finally {
    resetSheetsClient();
    logger.resetLogger();
  }
}

export { loadConfig } from './config';
export { EmptyOutputError, GenerationError, PipelineError, StorageError } from './errors';
export { FlowController } from './pipeline/FlowController';
export type { FlowResult, FlowState } from './pipeline/FlowController';
export { validatePrompt } from './pipeline/validatePrompt';
export type { ValidatedPrompt } from './pipeline/validatePrompt';
export { PromptGenerator } from './services/PromptGenerator';
export { QueueWriter } from './services/QueueWriter';
export { withRetry, RetryError } from './utils/retry';
