import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/cli/parser.js';

describe('CLI Argument Parser', () => {
  describe('command parsing', () => {
    it('should parse command with no flags', () => {
      const result = parseArgs(['config']);
      expect(result.command).toBe('config');
      expect(result.positionals).toEqual([]);
      expect(result.flags).toEqual({});
    });

    it('should parse command with positional arguments', () => {
      const result = parseArgs(['score', 'octo-org/one', 'octo-org/two']);
      expect(result.command).toBe('score');
      expect(result.positionals).toEqual(['octo-org/one', 'octo-org/two']);
    });

    it('should handle no arguments', () => {
      const result = parseArgs([]);
      expect(result.command).toBeUndefined();
      expect(result.positionals).toEqual([]);
      expect(result.flags).toEqual({});
    });
  });

  describe('long flags', () => {
    it('should parse long flag with value', () => {
      const result = parseArgs(['score', 'octo-org/one', '--token', 'test-secret']);
      expect(result.flags['token']).toBe('test-secret');
      expect(result.positionals).toEqual(['octo-org/one']);
    });

    it('should parse long flag with equals syntax', () => {
      const result = parseArgs(['calc', '--min-contributions=5']);
      expect(result.flags['min-contributions']).toBe('5');
    });

    it('should handle empty value after equals', () => {
      const result = parseArgs(['calc', '--config=']);
      expect(result.flags['config']).toBe('');
    });

    it('should treat a trailing long flag as boolean', () => {
      const result = parseArgs(['score', 'octo-org/one', '--dry-run']);
      expect(result.flags['dry-run']).toBe(true);
    });

    it('should collect repeated flags into an array', () => {
      const result = parseArgs(['score', '--exclude', 'alice', '--exclude=bob', '--exclude', 'carol']);
      expect(result.flags['exclude']).toEqual(['alice', 'bob', 'carol']);
    });
  });

  describe('short flags', () => {
    it('should parse short boolean flags', () => {
      const result = parseArgs(['-h']);
      expect(result.flags['h']).toBe(true);
      expect(result.command).toBeUndefined();
    });

    it('should expand combined short flags', () => {
      const result = parseArgs(['config', '-hv']);
      expect(result.flags).toEqual({ h: true, v: true });
    });

    it('should treat negative numbers as values', () => {
      const result = parseArgs(['calc', '-n', '-5']);
      expect(result.flags['n']).toBe('-5');
    });
  });

  describe('boolean flags', () => {
    it('should not let a declared boolean flag swallow a positional', () => {
      const result = parseArgs(['score', '--dry-run', 'octo-org/one'], { booleans: ['dry-run'] });
      expect(result.flags['dry-run']).toBe(true);
      expect(result.positionals).toEqual(['octo-org/one']);
    });

    it('should let an undeclared flag take the next word', () => {
      const result = parseArgs(['score', '--dry-run', 'octo-org/one']);
      expect(result.flags['dry-run']).toBe('octo-org/one');
      expect(result.positionals).toEqual([]);
    });
  });

  describe('argument terminator', () => {
    it('should treat everything after -- as positional', () => {
      const result = parseArgs(['calc', '--', '--weird-file.json']);
      expect(result.command).toBe('calc');
      expect(result.positionals).toEqual(['--weird-file.json']);
      expect(result.flags).toEqual({});
    });

    it('should not use -- as a flag value', () => {
      const result = parseArgs(['calc', '--skip-invalid', '--', 'counts.json']);
      expect(result.flags['skip-invalid']).toBe(true);
      expect(result.positionals).toEqual(['counts.json']);
    });
  });
});
