/**
 * Tests for ToolManager, ToolValidator and tool definitions
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolManager } from '@tools/ToolManager.js';
import { defineTool, toolId } from '@tools/Tool.js';
import { Logger, LogLevel } from '@services/Logger.js';
import { ConfigurationError, SchemaInferenceError, ToolArgumentDecodeError, ToolNotFoundError } from '../../errors.js';

describe('toolId', () => {
  it('should lower-case and replace spaces and dashes', () => {
    expect(toolId('Get Capital')).toBe('get_capital');
    expect(toolId('fetch-weather-now')).toBe('fetch_weather_now');
    expect(toolId('  Mixed - Name ')).toBe('mixed_name');
  });
});

describe('ToolManager', () => {
  let logger: Logger;

  const getCapital = defineTool({
    name: 'Get Capital',
    description: 'Look up the capital city of a country',
    parameters: z.object({ country: z.string() }),
    handler: ({ country }) => `capital of ${country}`,
  });

  const search = defineTool({
    name: 'search',
    description: 'Search documents',
    parameters: z.object({ query: z.string(), limit: z.number().int().optional() }),
    handler: vi.fn(),
  });

  beforeEach(() => {
    logger = new Logger({ level: LogLevel.ERROR });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  describe('Registration', () => {
    it('should register tools under their normalized names', () => {
      const manager = new ToolManager([getCapital, search], logger);

      expect(manager.size).toBe(2);
      expect(manager.getTool('get_capital')).toBe(getCapital);
      expect(manager.getTool('Get Capital')).toBeUndefined();
    });

    it('should reject duplicate names', () => {
      expect(() => new ToolManager([getCapital, getCapital], logger)).toThrow(ConfigurationError);
      expect(() => new ToolManager([getCapital, getCapital], logger)).toThrow("duplicate tool name 'get_capital'");
    });

    it('should reject argument shapes that cannot be expressed', () => {
      const bad = defineTool({
        name: 'bad',
        description: 'Takes anything',
        parameters: z.object({ value: z.any() }),
        handler: () => null,
      });

      expect(() => new ToolManager([bad], logger)).toThrow(SchemaInferenceError);
    });
  });

  describe('Function Definitions', () => {
    it('should declare strict function schemas in registration order', () => {
      const manager = new ToolManager([getCapital, search], logger);
      const definitions = manager.getFunctionDefinitions();

      expect(definitions.map(d => d.function.name)).toEqual(['get_capital', 'search']);
      expect(definitions[0]).toEqual({
        type: 'function',
        function: {
          name: 'get_capital',
          description: 'Look up the capital city of a country',
          strict: true,
          parameters: {
            type: 'object',
            properties: { country: { type: 'string' } },
            required: ['country'],
            additionalProperties: false,
          },
        },
      });
    });
  });

  describe('Resolution', () => {
    let manager: ToolManager;

    beforeEach(() => {
      manager = new ToolManager([getCapital, search], logger);
    });

    it('should decode arguments', () => {
      const resolved = manager.resolve({ id: 'call-1', name: 'search', arguments: '{"query":"zod","limit":5}' });

      expect(resolved.tool).toBe(search);
      expect(resolved.args).toEqual({ query: 'zod', limit: 5 });
    });

    it('should treat empty argument text as an empty object', () => {
      const noArgs = defineTool({
        name: 'now',
        description: 'Current time',
        parameters: z.object({}),
        handler: () => '12:00',
      });
      const withNoArgs = new ToolManager([noArgs], logger);

      expect(withNoArgs.resolve({ id: 'call-1', name: 'now', arguments: '' }).args).toEqual({});
    });

    it('should fail on unknown tools', () => {
      try {
        manager.resolve({ id: 'call-9', name: 'launch', arguments: '{}' });
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof ToolNotFoundError)) throw error;
        expect(error.toolName).toBe('launch');
        expect(error.toolCallId).toBe('call-9');
        expect(error.stage).toBe('tool');
      }
    });

    it('should fail on malformed JSON', () => {
      try {
        manager.resolve({ id: 'call-1', name: 'search', arguments: '{"query":' });
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof ToolArgumentDecodeError)) throw error;
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^invalid JSON: /);
      }
    });

    it('should fail when arguments are not an object', () => {
      expect(() => manager.resolve({ id: 'call-1', name: 'search', arguments: '["zod"]' })).toThrow(
        "invalid arguments for tool 'search' (call call-1): arguments must be a JSON object"
      );
    });

    it('should fail on missing required fields', () => {
      try {
        manager.resolve({ id: 'call-1', name: 'search', arguments: '{"limit":3}' });
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof ToolArgumentDecodeError)) throw error;
        expect(error.issues).toEqual(['query: Required']);
      }
    });

    it('should fail on undeclared fields', () => {
      try {
        manager.resolve({ id: 'call-1', name: 'search', arguments: '{"query":"zod","page":2}' });
        expect.unreachable();
      } catch (error) {
        if (!(error instanceof ToolArgumentDecodeError)) throw error;
        expect(error.issues).toEqual(["(root): Unrecognized key(s) in object: 'page'"]);
      }
    });
  });
});
