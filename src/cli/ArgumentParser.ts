/**
 * ArgumentParser - Command-line parsing for the turnkit CLI
 */

import { Command, InvalidArgumentError } from 'commander';
import type { ReasoningEffort } from '@shared/index.js';

export interface CLIOptions {
  /** Prompt words joined with spaces */
  prompt: string;

  // Model settings
  model?: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  reasoningEffort?: ReasoningEffort;

  // Transport
  baseUrl?: string;
  retries?: number;

  // Output
  json: boolean;

  // Logging
  verbose: boolean;
  debug: boolean;
}

type RawOptions = {
  model?: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  reasoningEffort?: ReasoningEffort;
  baseUrl?: string;
  retries?: number;
  json?: boolean;
  verbose?: boolean;
  debug?: boolean;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function parseReasoningEffort(value: string): ReasoningEffort {
  const lower = value.toLowerCase();
  if (lower === 'low' || lower === 'medium' || lower === 'high') {
    return lower;
  }
  throw new InvalidArgumentError('Must be one of: low, medium, high.');
}

export class ArgumentParser {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupArguments();
  }

  private setupArguments(): void {
    this.program
      .name('turnkit')
      .description('Ask an OpenAI-compatible model a question from the command line')
      .version('0.1.0')
      .argument('<prompt...>', 'Prompt to send')
      .exitOverride()
      .addHelpText(
        'after',
        `
Environment:
  OPENAI_API_KEY     API key for the endpoint
  OPENAI_API_BASE    Base URL of the endpoint
  TURNKIT_MODEL      Default model
  TURNKIT_LOG_LEVEL  error | warn | info | verbose | debug
        `
      );

    // Model settings
    this.program
      .option('--model <name>', 'The model to use')
      .option('--system <text>', 'System message placed before the prompt')
      .option('--temperature <float>', 'Sampling temperature', parseNumber)
      .option('--max-tokens <int>', 'Maximum tokens to generate', parsePositiveInt)
      .option('--reasoning-effort <level>', 'Reasoning effort (low, medium, high)', parseReasoningEffort);

    // Transport
    this.program
      .option('--base-url <url>', 'Base URL of the OpenAI-compatible endpoint')
      .option('--retries <int>', 'Transport attempts per model call', parsePositiveInt);

    // Output
    this.program.option('--json', 'Ask for a structured { "answer": ... } object and print it as JSON');

    // Logging
    this.program
      .option('-v, --verbose', 'Enable verbose logging')
      .option('--debug', 'Enable debug logging');
  }

  /**
   * Parse command-line arguments
   *
   * @param argv - Process arguments (defaults to process.argv)
   * @throws CommanderError on invalid arguments, --help or --version
   */
  parse(argv: string[] = process.argv): CLIOptions {
    this.program.parse(argv);
    const opts = this.program.opts<RawOptions>();

    return {
      prompt: this.program.args.join(' '),

      model: opts.model,
      system: opts.system,
      temperature: opts.temperature,
      maxTokens: opts.maxTokens,
      reasoningEffort: opts.reasoningEffort,

      baseUrl: opts.baseUrl,
      retries: opts.retries,

      json: opts.json === true,

      verbose: opts.verbose === true,
      debug: opts.debug === true,
    };
  }

  /**
   * Show help text
   */
  showHelp(): void {
    this.program.outputHelp();
  }
}
