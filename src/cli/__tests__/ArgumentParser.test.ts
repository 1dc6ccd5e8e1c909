/**
 * Tests for ArgumentParser
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CommanderError } from 'commander';
import { ArgumentParser } from '@cli/ArgumentParser.js';

function parseError(parser: ArgumentParser, argv: string[]): CommanderError {
  try {
    parser.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parse to fail');
}

describe('ArgumentParser', () => {
  let parser: ArgumentParser;

  beforeEach(() => {
    parser = new ArgumentParser();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  describe('Prompt', () => {
    it('should join the prompt words', () => {
      expect(parser.parse(['node', 'turnkit', 'What', 'is', 'the', 'capital?'])).toEqual({
        prompt: 'What is the capital?',
        model: undefined,
        system: undefined,
        temperature: undefined,
        maxTokens: undefined,
        reasoningEffort: undefined,
        baseUrl: undefined,
        retries: undefined,
        json: false,
        verbose: false,
        debug: false,
      });
    });

    it('should require a prompt', () => {
      expect(parseError(parser, ['node', 'turnkit']).code).toBe('commander.missingArgument');
    });
  });

  describe('Model Settings', () => {
    it('should parse model options around the prompt', () => {
      const options = parser.parse([
        'node',
        'turnkit',
        '--model',
        'test-model',
        'Hello',
        '--system',
        'Be brief',
        '--temperature',
        '0.2',
        '--max-tokens',
        '64',
        '--reasoning-effort',
        'HIGH',
      ]);

      expect(options.prompt).toBe('Hello');
      expect(options.model).toBe('test-model');
      expect(options.system).toBe('Be brief');
      expect(options.temperature).toBe(0.2);
      expect(options.maxTokens).toBe(64);
      expect(options.reasoningEffort).toBe('high');
    });

    it('should reject a non-numeric temperature', () => {
      expect(parseError(parser, ['node', 'turnkit', 'Hi', '--temperature', 'warm']).code).toBe(
        'commander.invalidArgument'
      );
    });

    it('should reject an unknown reasoning effort', () => {
      expect(parseError(parser, ['node', 'turnkit', 'Hi', '--reasoning-effort', 'extreme']).code).toBe(
        'commander.invalidArgument'
      );
    });
  });

  describe('Transport and output', () => {
    it('should parse transport, output and logging flags', () => {
      const options = parser.parse([
        'node',
        'turnkit',
        'Hi',
        '--base-url',
        'http://localhost:8080/v1',
        '--retries',
        '5',
        '--json',
        '-v',
        '--debug',
      ]);

      expect(options.baseUrl).toBe('http://localhost:8080/v1');
      expect(options.retries).toBe(5);
      expect(options.json).toBe(true);
      expect(options.verbose).toBe(true);
      expect(options.debug).toBe(true);
    });

    it('should reject a zero attempt budget', () => {
      expect(parseError(parser, ['node', 'turnkit', 'Hi', '--retries', '0']).code).toBe('commander.invalidArgument');
    });
  });
});
