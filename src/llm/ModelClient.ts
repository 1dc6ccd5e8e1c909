/**
 * ModelClient - Abstract transport to a chat-completion endpoint
 *
 * Performs exactly one request per complete() call. Retries, hooks and tool
 * rounds belong to the conversation driver, so implementations must not
 * retry on their own.
 *
 * @example
 * ```typescript
 * const transport = new OpenAIModelClient({ apiKey, baseURL });
 * const response = await transport.complete(request, { signal });
 * ```
 */

import type { ChatRequest, ChatResponse } from '@shared/index.js';

export interface CompleteOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

export abstract class ModelClient {
  /**
   * Send one chat-completion request
   *
   * @param request - Fully built request
   * @param options - Cancellation
   * @returns The endpoint's response
   * @throws Any transport failure; the driver decides whether to retry
   */
  abstract complete(request: ChatRequest, options?: CompleteOptions): Promise<ChatResponse>;

  /**
   * API endpoint URL, for logging
   */
  abstract get endpoint(): string;
}
