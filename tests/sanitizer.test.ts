import { describe, expect, test } from 'vitest';

import {
  buildContentDisposition,
  redactUrl,
  sanitizeFilename,
  sanitizeText,
  toAsciiHeaderValue,
  truncateText,
} from '../src/utils/sanitizer.js';

describe('sanitizer', () => {
  describe('sanitizeText', () => {
    test('collapses whitespace and trims', () => {
      expect(sanitizeText('  hello \t\n  world  ')).toBe('hello world');
    });

    test('replaces control characters', () => {
      expect(sanitizeText('Line\nBreak\u0000Title End')).toBe(
        'Line Break Title End'
      );
    });

    test('handles null and undefined', () => {
      expect(sanitizeText(null)).toBe('');
      expect(sanitizeText(undefined)).toBe('');
    });
  });

  describe('truncateText', () => {
    test('adds an ellipsis when over the limit', () => {
      expect(truncateText('abcdefghij', 8)).toBe('abcde...');
    });

    test('leaves short text alone', () => {
      expect(truncateText('abc', 8)).toBe('abc');
    });

    test('never splits a surrogate pair', () => {
      const text = `${'a'.repeat(196)}${'\u{1F600}'.repeat(5)}`;
      expect(truncateText(text, 200)).toBe(`${'a'.repeat(196)}\u{1F600}...`);
    });

    test('keeps the first character for tiny limits', () => {
      expect(truncateText('abcdef', 2)).toBe('a');
    });
  });

  describe('sanitizeFilename', () => {
    test('removes path traversal', () => {
      expect(sanitizeFilename('../etc/passwd', 120)).toBe('_etc_passwd');
    });

    test('replaces reserved characters', () => {
      expect(sanitizeFilename('a:b*c?', 120)).toBe('a_b_c_');
    });

    test('caps the length', () => {
      expect(sanitizeFilename('x'.repeat(300), 120)).toHaveLength(120);
    });

    test('caps by code points when an emoji crosses the limit', () => {
      expect(sanitizeFilename(`${'a'.repeat(119)}\u{1F600} tail`, 120)).toBe(
        `${'a'.repeat(119)}\u{1F600}`
      );
    });

    test('falls back when nothing is left', () => {
      expect(sanitizeFilename('   ', 120)).toBe('download');
      expect(sanitizeFilename('...', 120, 'media')).toBe('media');
    });
  });

  test('toAsciiHeaderValue drops non-ASCII characters', () => {
    expect(toAsciiHeaderValue('Ünïcode Tïtle ✓')).toBe('ncode Ttle');
  });

  describe('buildContentDisposition', () => {
    test('emits an ASCII filename and an RFC 5987 filename*', () => {
      expect(buildContentDisposition('Café "Live".mp3')).toBe(
        `attachment; filename="Caf _Live_.mp3"; filename*=UTF-8''Caf%C3%A9%20%22Live%22.mp3`
      );
    });

    test('drops lone surrogates instead of failing to encode', () => {
      expect(buildContentDisposition('bad\uD83D.mp3')).toBe(
        `attachment; filename="bad.mp3"; filename*=UTF-8''bad.mp3`
      );
    });

    test('percent-encodes characters encodeURIComponent leaves alone', () => {
      expect(buildContentDisposition("it's (live).mp3")).toBe(
        `attachment; filename="it's (live).mp3"; filename*=UTF-8''it%27s%20%28live%29.mp3`
      );
    });
  });

  describe('redactUrl', () => {
    test('reduces a URL to scheme and host', () => {
      expect(redactUrl('https://www.youtube.com/watch?v=abcDEF12345')).toBe(
        'https://www.youtube.com'
      );
    });

    test('hides unparseable values', () => {
      expect(redactUrl('not a url')).toBe('[REDACTED]');
    });
  });
});
