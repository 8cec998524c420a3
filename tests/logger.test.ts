/**
 * Tests for console narration helpers
 */

import { describe, test, expect, afterEach, vi } from 'vitest';
import { errorMessage, log, yellow } from '../src/lib/logger';

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('exposes only the levels the tool narrates with', () => {
    expect(Object.keys(log)).toEqual(['info', 'success', 'warn', 'error']);
  });

  test('writes errors to stderr and warnings to stdout', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    log.warn('careful');
    log.error('broken');

    expect(out).toHaveBeenCalledWith(yellow('careful'));
    expect(err).toHaveBeenCalledWith('\x1b[31mbroken\x1b[0m');
  });
});

describe('errorMessage', () => {
  test('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
