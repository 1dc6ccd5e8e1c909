/**
 * Tests for HookPipeline
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HookPipeline, type AskContext, type BeforeRequestHook, type RequestOutcome } from '@agent/HookPipeline.js';
import { Logger, LogLevel } from '@services/Logger.js';
import type { ChatRequest } from '@shared/index.js';
import { textResponse } from '../../__tests__/helpers.js';

describe('HookPipeline', () => {
  let logger: Logger;
  let ctx: AskContext;
  const request: ChatRequest = { model: 'test-model', messages: [{ role: 'user', content: 'Hi' }] };

  beforeEach(() => {
    logger = new Logger({ level: LogLevel.ERROR });
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ctx = { runId: 'run-1', turn: 1, generationName: 'chat-completion', trace: {}, logger };
  });

  describe('Before hooks', () => {
    it('should run in registration order, each seeing the previous result', async () => {
      const seen: number[] = [];
      const pipeline = new HookPipeline(
        [
          (_ctx, req) => {
            seen.push(req.messages.length);
            return { ...req, temperature: 0.1 };
          },
          async (_ctx, req) => {
            seen.push(req.temperature ?? -1);
            return { ...req, model: 'other-model' };
          },
        ],
        [],
        logger
      );

      const result = await pipeline.runBefore(ctx, request);

      expect(seen).toEqual([1, 0.1]);
      expect(result.model).toBe('other-model');
      expect(result.temperature).toBe(0.1);
    });

    it('should keep the previous value when a hook throws', async () => {
      const pipeline = new HookPipeline(
        [
          () => {
            throw new Error('hook exploded');
          },
          (_ctx, req) => ({ ...req, seed: 7 }),
        ],
        [],
        logger
      );

      const result = await pipeline.runBefore(ctx, request);

      expect(result).toEqual({ ...request, seed: 7 });
      expect(logger.getAllLogs().map(entry => entry.message)).toEqual([
        '[HOOKS] Before-request hook #0 failed: hook exploded',
      ]);
    });

    it('should reject results without a model or messages', async () => {
      const dropModel: BeforeRequestHook = (_ctx, req) => ({ ...req, model: '' });
      const dropMessages: BeforeRequestHook = (_ctx, req) => ({ ...req, messages: [] });
      const pipeline = new HookPipeline([dropModel, dropMessages], [], logger);

      const result = await pipeline.runBefore(ctx, request);

      expect(result).toBe(request);
      expect(logger.getLogCount()).toBe(2);
    });
  });

  describe('After hooks', () => {
    it('should see the response and may replace it', async () => {
      const response = textResponse('original');
      const replaced = textResponse('replaced');
      const pipeline = new HookPipeline(
        [],
        [
          (_ctx, outcome) => {
            expect(outcome.response).toBe(response);
            return { response: replaced };
          },
        ],
        logger
      );

      expect(await pipeline.runAfter(ctx, { response })).toEqual({ response: replaced });
    });

    it('should see the error on the failure path', async () => {
      const hook = vi.fn((_ctx: AskContext, outcome: RequestOutcome) => outcome);
      const pipeline = new HookPipeline([], [hook], logger);
      const failure = new Error('boom');

      const outcome = await pipeline.runAfter(ctx, { error: failure });

      expect(hook).toHaveBeenCalledWith(ctx, { error: failure });
      expect(outcome.response).toBeUndefined();
      expect(outcome.error).toBe(failure);
    });

    it('should ignore empty outcomes and thrown errors', async () => {
      const response = textResponse('kept');
      const pipeline = new HookPipeline(
        [],
        [
          () => ({}),
          () => {
            throw new Error('after exploded');
          },
        ],
        logger
      );

      expect(await pipeline.runAfter(ctx, { response })).toEqual({ response });
      expect(logger.getLogCount()).toBe(2);
    });
  });
});
