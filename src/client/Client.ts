/**
 * Client - Shared configuration for asks and graph runs
 *
 * Holds the model transport, the default model, the hook pipeline, the
 * lifecycle callbacks, an optional tracer and a scoped logger. A client is
 * immutable after construction and can serve many concurrent asks.
 *
 * @example
 * ```typescript
 * const client = new Client({ apiKey: 'test-secret', defaultModel: 'gpt-4o-mini' });
 * const answer = await ask(client, { prompt: 'Say hello' });
 * ```
 */

import { OpenAIModelClient } from '@llm/OpenAIModelClient.js';
import type { ModelClient } from '@llm/ModelClient.js';
import { HookPipeline, type AfterRequestHook, type BeforeRequestHook } from '@agent/HookPipeline.js';
import type { AgentCallback } from '@agent/CallbackManager.js';
import type { Tracer } from '@tracing/Tracer.js';
import { tracingPlugin } from '@tracing/TracingPlugin.js';
import { Logger } from '@services/Logger.js';
import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from '@config/defaults.js';
import { ConfigurationError } from '../errors.js';

/**
 * A named bundle of hooks
 */
export interface Plugin {
  name: string;
  beforeRequest?: BeforeRequestHook;
  afterRequest?: AfterRequestHook;
}

export interface ClientOptions extends ClientConfigInput {
  /** Hooks run before every model call, in order */
  beforeRequest?: readonly BeforeRequestHook[];
  /** Hooks run after every model call, in order */
  afterRequest?: readonly AfterRequestHook[];
  /** Plugins whose hooks run after the plain hooks */
  plugins?: readonly Plugin[];
  callbacks?: readonly AgentCallback[];
  /** Tracing backend; installs the tracing plugin and enables tool and graph spans */
  tracer?: Tracer;
  /** Custom transport; replaces the OpenAI-compatible one */
  modelClient?: ModelClient;
  /** Extra headers for the OpenAI-compatible transport */
  headers?: Record<string, string>;
  /** Environment to read settings from (process.env by default) */
  env?: NodeJS.ProcessEnv;
}

export class Client {
  readonly config: ClientConfig;
  readonly transport: ModelClient;
  readonly hooks: HookPipeline;
  readonly callbacks: readonly AgentCallback[];
  readonly tracer?: Tracer;
  readonly logger: Logger;
  readonly plugins: readonly Plugin[];

  /**
   * @throws ConfigurationError on invalid settings, or when neither an
   *   API key nor a custom transport is available
   */
  constructor(options: ClientOptions = {}) {
    this.config = resolveClientConfig(options, options.env);
    this.logger = new Logger({ level: this.config.logLevel, scope: 'turnkit' });

    if (options.modelClient) {
      this.transport = options.modelClient;
    } else {
      if (this.config.apiKey === null) {
        throw new ConfigurationError('no API key: pass apiKey, set OPENAI_API_KEY, or supply a modelClient');
      }
      this.transport = new OpenAIModelClient({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL ?? undefined,
        timeoutMs: this.config.requestTimeoutMs,
        headers: options.headers,
        logger: this.logger,
      });
    }

    this.tracer = options.tracer;
    this.plugins = this.tracer ? [...(options.plugins ?? []), tracingPlugin(this.tracer)] : [...(options.plugins ?? [])];
    this.callbacks = [...(options.callbacks ?? [])];

    const before: BeforeRequestHook[] = [...(options.beforeRequest ?? [])];
    const after: AfterRequestHook[] = [...(options.afterRequest ?? [])];
    for (const plugin of this.plugins) {
      if (plugin.beforeRequest) before.push(plugin.beforeRequest);
      if (plugin.afterRequest) after.push(plugin.afterRequest);
    }
    this.hooks = new HookPipeline(before, after, this.logger);

    this.logger.debug(
      `[CLIENT] Ready: endpoint=${this.transport.endpoint} defaultModel=${this.config.defaultModel ?? '(none)'}`,
      `hooks=${before.length}/${after.length} plugins=${this.plugins.map(p => p.name).join(',') || '(none)'}`
    );
  }
}
