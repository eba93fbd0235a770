import type { MockInstance } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CLIResponse } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';
import { OutputManager } from '../output.js';

describe('OutputManager', () => {
  let consoleLogSpy: MockInstance<(message?: unknown, ...optionalParams: unknown[]) => void>;
  let stderrSpy: MockInstance;
  let processExitSpy: MockInstance<(code?: number | string | null) => never>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {
      // Mock implementation
    });
    stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
      throw new Error('process.exit called');
    }) as never;
  });

  afterEach(() => {
    vi.useRealTimers();
    consoleLogSpy.mockRestore();
    stderrSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  describe('constructor', () => {
    it('should default to text format', () => {
      const output = new OutputManager();
      expect(output.isTextMode()).toBe(true);
      expect(output.isJsonMode()).toBe(false);
    });

    it('should accept json format', () => {
      const output = new OutputManager('json');
      expect(output.isJsonMode()).toBe(true);
      expect(output.isTextMode()).toBe(false);
    });
  });

  describe('lines', () => {
    it('should print each line in text mode', () => {
      new OutputManager('text').lines(['first', 'second']);

      expect(consoleLogSpy.mock.calls).toEqual([['first'], ['second']]);
    });

    it('should print nothing in json mode', () => {
      new OutputManager('json').lines(['first']);

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('json', () => {
    it('should print a success envelope with duration in json mode', () => {
      const output = new OutputManager('json');
      vi.advanceTimersByTime(1000);

      output.json('list', { total: '0.00' }, { count: 0 });

      expect(consoleLogSpy).toHaveBeenCalledOnce();
      const response = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0])) as CLIResponse;
      expect(response).toEqual({
        success: true,
        command: 'list',
        timestamp: '2024-01-01T00:00:01.000Z',
        data: { total: '0.00' },
        metadata: { duration_ms: 1000, count: 0 },
      });
    });

    it('should print nothing in text mode', () => {
      new OutputManager('text').json('list', {});

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    it('should write the message and a tip to stderr in text mode', () => {
      const output = new OutputManager('text');

      expect(() => output.error('search', new Error('You must provide a search query.'), ExitCodes.INVALID_ARGS)).toThrow(
        'process.exit called'
      );

      expect(stderrSpy).toHaveBeenCalledTimes(2);
      expect(String(stderrSpy.mock.calls[0]?.[0])).toMatch(/ Error: You must provide a search query\.\n$/);
      expect(String(stderrSpy.mock.calls[1]?.[0])).toContain('Run spendlog help for usage information.');
      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(2);
    });

    it('should default to the general error code', () => {
      const output = new OutputManager('text');

      expect(() => output.error('list', new Error('boom'))).toThrow('process.exit called');

      expect(stderrSpy).toHaveBeenCalledOnce();
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should print an error envelope to stdout in json mode', () => {
      const output = new OutputManager('json');

      expect(() => output.error('add', new Error('connection refused'), ExitCodes.DATABASE_ERROR)).toThrow(
        'process.exit called'
      );

      const response = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0])) as CLIResponse;
      expect(response.success).toBe(false);
      expect(response.error).toEqual({ code: 'DATABASE_ERROR', message: 'connection refused' });
      expect(stderrSpy).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(7);
    });
  });
});
