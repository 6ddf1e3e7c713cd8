import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { ApiError, ConfigurationError, TfmapError, ErrorCode } from '@tfmap/core';
import { ErrorHandler, REDACTED, displayContext } from '../error-handler.js';

describe('ErrorHandler', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getExitCode', () => {
    it.each([
      [new ConfigurationError('missing key'), 2],
      [new TfmapError('bad', ErrorCode.INPUT_INVALID), 2],
      [new TfmapError('clone', ErrorCode.IO_CLONE_FAILED), 3],
      [new ApiError('boom', 500), 4],
      [new ApiError('slow', 429), 4],
      [new ApiError('denied', 401), 5],
      [new TfmapError('oauth', ErrorCode.AUTH_OAUTH_FAILED), 5],
      [new TfmapError('none', ErrorCode.PLATFORM_NOT_FOUND), 5],
      [new TfmapError('empty', ErrorCode.ANALYSIS_NO_RESULTS), 1],
      [new Error('plain'), 1],
      ['string', 1],
    ])('maps %s to %i', (error, code) => {
      expect(ErrorHandler.getExitCode(error)).toBe(code);
    });
  });

  describe('displayContext', () => {
    it('masks sensitive keys and drops empty values', () => {
      const error = new TfmapError('x', ErrorCode.NET_ERROR, undefined, {
        token: 'test-token',
        ApiKey: 'test-key',
        path: '/threat_models/tm-1',
        statusCode: undefined,
        retry: null,
      });
      expect(displayContext(error)).toEqual([
        ['token', REDACTED],
        ['ApiKey', REDACTED],
        ['path', '/threat_models/tm-1'],
      ]);
    });
  });

  describe('formatError', () => {
    it('prints the user message, details, code and hints', () => {
      const errors: string[] = [];
      vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
        errors.push(String(msg));
      });
      const logs: string[] = [];
      vi.spyOn(console, 'log').mockImplementation((msg: unknown) => {
        logs.push(String(msg));
      });

      ErrorHandler.formatError(
        new TfmapError('no repos', ErrorCode.PLATFORM_NOT_FOUND, 'Nothing to analyze', {
          threatModelId: 'tm-1',
        })
      );

      expect(errors).toEqual([
        '❌ Nothing to analyze',
        '   Extra details:',
        '   threatModelId: tm-1',
        `   Code: ${ErrorCode.PLATFORM_NOT_FOUND}`,
        '\n💡 Hints:',
      ]);
      expect(logs).toEqual([
        'ℹ️  • Add GitHub repositories to the threat model in TMI',
        'ℹ️  • Run "tfmap list-repos <threat-model-id>" to see what is linked',
      ]);
    });

    it('prints plain errors by message', () => {
      const errors: string[] = [];
      vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
        errors.push(String(msg));
      });
      ErrorHandler.formatError(new Error('disk full'));
      ErrorHandler.formatError(42);
      expect(errors).toEqual(['❌ disk full', '❌ Something went wrong unexpectedly: 42']);
    });
  });
});
