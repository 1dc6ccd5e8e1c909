/**
 * CLI runner
 *
 * Kept apart from the executable entry point so it can run against a
 * custom transport and captured output.
 */

import chalk from 'chalk';
import { CommanderError } from 'commander';
import { z } from 'zod';
import { ArgumentParser, type CLIOptions } from './ArgumentParser.js';
import { Client } from '@client/Client.js';
import { ask, type AskBaseOptions } from '@agent/Ask.js';
import type { ModelClient } from '@llm/ModelClient.js';
import { TurnkitError } from '../errors.js';
import { formatError } from '@utils/errorUtils.js';

export { ArgumentParser, type CLIOptions };

/**
 * Shape of the --json answer
 */
export const JSON_ANSWER = z.object({
  answer: z.string().describe('The answer to the prompt'),
});

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Replaces the OpenAI-compatible transport */
  modelClient?: ModelClient;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
};

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let options: CLIOptions;
  try {
    options = new ArgumentParser().parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or the usage error
      return error.exitCode;
    }
    throw error;
  }

  try {
    const client = new Client({
      baseURL: options.baseUrl,
      defaultModel: options.model,
      modelClient: io.modelClient,
      env: io.env,
    });
    client.logger.configure({ verbose: options.verbose, debug: options.debug });

    const askOptions: AskBaseOptions = {
      prompt: options.prompt,
      system: options.system,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      reasoningEffort: options.reasoningEffort,
      retries: options.retries,
    };

    if (options.json) {
      const result = await ask(client, { ...askOptions, output: JSON_ANSWER });
      io.stdout(JSON.stringify(result, null, 2));
    } else {
      io.stdout(await ask(client, askOptions));
    }
    return 0;
  } catch (error) {
    const stage = error instanceof TurnkitError ? `[${error.stage}] ` : '';
    io.stderr(chalk.red(`Error: ${stage}${formatError(error)}`));
    return 1;
  }
}
