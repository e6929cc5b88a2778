/**
 * Tests for ArgumentParser
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ArgumentParser } from '../ArgumentParser.js';

describe('ArgumentParser', () => {
  let parser: ArgumentParser;

  beforeEach(() => {
    parser = new ArgumentParser().exitOverride();
  });

  describe('run', () => {
    it('should join the task words', () => {
      const command = parser.parse(['node', 'tool-agents', 'run', 'What', 'is', '7', '+', '2?']);

      expect(command).toEqual({
        kind: 'run',
        task: 'What is 7 + 2?',
        options: {
          model: undefined,
          endpoint: undefined,
          temperature: undefined,
          maxIterations: undefined,
          system: undefined,
          mcpConfig: undefined,
          server: undefined,
          verbose: undefined,
          debug: undefined,
        },
      });
    });

    it('should parse model settings', () => {
      const command = parser.parse([
        'node',
        'tool-agents',
        'run',
        '--model',
        'openai/gpt-4o-mini',
        '--endpoint',
        'https://models.example.test/v1',
        '--temperature',
        '0.2',
        '--max-iterations',
        '4',
        'Hello',
      ]);

      expect(command).toMatchObject({
        kind: 'run',
        task: 'Hello',
        options: {
          model: 'openai/gpt-4o-mini',
          endpoint: 'https://models.example.test/v1',
          temperature: 0.2,
          maxIterations: 4,
        },
      });
    });

    it('should parse the system prompt, providers and logging flags', () => {
      const command = parser.parse([
        'node',
        'tool-agents',
        'run',
        '--system',
        'Be brief.',
        '--mcp-config',
        './mcp.json',
        '--server',
        'memory',
        'calc',
        '--verbose',
        '--debug',
        '--',
        'Remember this',
      ]);

      expect(command).toMatchObject({
        kind: 'run',
        task: 'Remember this',
        options: {
          system: 'Be brief.',
          mcpConfig: './mcp.json',
          server: ['memory', 'calc'],
          verbose: true,
          debug: true,
        },
      });
    });

    it('should reject an invalid iteration budget', () => {
      expect(() => parser.parse(['node', 'tool-agents', 'run', '--max-iterations', 'many', 'Hi'])).toThrow();
    });

    it('should reject an iteration budget of zero', () => {
      expect(() => parser.parse(['node', 'tool-agents', 'run', '--max-iterations', '0', 'Hi'])).toThrow(
        'Expected a positive integer.'
      );
    });

    it('should require a task', () => {
      expect(() => parser.parse(['node', 'tool-agents', 'run'])).toThrow();
    });
  });

  describe('config', () => {
    it('should parse config show with and without a key', () => {
      expect(parser.parse(['node', 'tool-agents', 'config', 'show'])).toEqual({ kind: 'config-show', key: undefined });
      expect(new ArgumentParser().exitOverride().parse(['node', 'tool-agents', 'config', 'show', 'model'])).toEqual({
        kind: 'config-show',
        key: 'model',
      });
    });

    it('should parse config set', () => {
      expect(parser.parse(['node', 'tool-agents', 'config', 'set', 'temperature', '0.5'])).toEqual({
        kind: 'config-set',
        key: 'temperature',
        value: '0.5',
      });
    });

    it('should parse config reset', () => {
      expect(parser.parse(['node', 'tool-agents', 'config', 'reset'])).toEqual({ kind: 'config-reset' });
    });
  });

  describe('usage', () => {
    it('should name the program', () => {
      expect(parser.getUsage()).toContain('Usage: tool-agents');
    });
  });
});
