/**
 * CLI options parsing tests
 */

import { describe, it, expect } from 'vitest';

import { createProgram, parseCliOptions } from '../cli.js';
import { InputError } from '../errors/index.js';

describe('parseCliOptions', () => {
  describe('basic options', () => {
    it('should parse input option', () => {
      expect(parseCliOptions({ input: 'session.log' }).input).toBe('session.log');
    });

    it('should parse config option', () => {
      expect(parseCliOptions({ config: './my-config.json' }).config).toBe('./my-config.json');
    });

    it('should ignore options of the wrong type', () => {
      expect(parseCliOptions({ input: 42, strict: 'yes' })).toEqual({});
    });
  });

  describe('format', () => {
    it('should accept text and json', () => {
      expect(parseCliOptions({ format: 'text' }).format).toBe('text');
      expect(parseCliOptions({ format: 'json' }).format).toBe('json');
    });

    it('should reject an unknown format', () => {
      expect(() => parseCliOptions({ format: 'xml' })).toThrow(InputError);
    });
  });

  describe('inspection flags', () => {
    it('should parse replay, reportUnknown and strict', () => {
      expect(parseCliOptions({ replay: true, reportUnknown: true, strict: false })).toEqual({
        replay: true,
        reportUnknown: true,
        strict: false,
      });
    });

    it('should parse verbose, debug and showConfig', () => {
      expect(parseCliOptions({ verbose: true, debug: true, showConfig: true })).toEqual({
        verbose: true,
        debug: true,
        showConfig: true,
      });
    });

    it('should parse quiet', () => {
      expect(parseCliOptions({ quiet: true })).toEqual({ quiet: true });
    });
  });

  describe('color', () => {
    it('should parse noColor when color is false (Commander.js negated flag)', () => {
      expect(parseCliOptions({ color: false }).noColor).toBe(true);
    });

    it('should not set noColor when color is true', () => {
      expect(parseCliOptions({ color: true }).noColor).toBeUndefined();
    });
  });
});

describe('createProgram', () => {
  it('should register every command', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(['inspect', 'handshake', 'bestmove', 'ready']);
  });
});
