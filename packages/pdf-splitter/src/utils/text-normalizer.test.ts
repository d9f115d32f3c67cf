import { describe, expect, test } from 'vitest';

import { TextNormalizer } from './text-normalizer';

describe('TextNormalizer', () => {
  describe('normalize', () => {
    test('returns empty string for empty input', () => {
      expect(TextNormalizer.normalize('')).toBe('');
    });

    test('collapses layout whitespace and line breaks', () => {
      expect(TextNormalizer.normalize('  NOME:\t JOÃO \n\n SILVA  ')).toBe(
        'NOME: JOÃO SILVA',
      );
    });

    test('replaces non-breaking spaces', () => {
      expect(TextNormalizer.normalize('MARIA\u00A0SOUZA')).toBe('MARIA SOUZA');
    });

    test('composes decomposed accents', () => {
      expect(TextNormalizer.normalize('JOA\u0303O')).toBe('JO\u00C3O');
    });
  });

  describe('toMatchKey', () => {
    test('upper-cases accented letters', () => {
      expect(TextNormalizer.toMatchKey('joão  silva')).toBe('JOÃO SILVA');
    });
  });

  describe('preview', () => {
    test('returns text unchanged when within the limit', () => {
      expect(TextNormalizer.preview('short', 10)).toBe('short');
    });

    test('truncates to the limit', () => {
      expect(TextNormalizer.preview('abcdefghij', 4)).toBe('abcd');
    });

    test('does not split surrogate pairs', () => {
      expect(TextNormalizer.preview('a\u{1F600}b', 2)).toBe('a\u{1F600}');
    });
  });
});
