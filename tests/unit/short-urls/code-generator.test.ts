/**
 * Unit tests for the random short code generator
 */

import { describe, expect, it } from 'vitest';

import { makeRandomCodeGenerator } from '@/modules/short-urls/core/code-generator.js';
import { CODE_ALPHABET, CODE_LENGTH, CODE_PATTERN } from '@/modules/short-urls/core/types.js';

import { makeFixedRandom } from '../../fixtures/fakes.js';

/** Random value that lands in the middle of the bucket for `symbol` */
const bucket = (symbol: string): number => (CODE_ALPHABET.indexOf(symbol) + 0.5) / 62;

describe('makeRandomCodeGenerator', () => {
  it('uses a 62-symbol alphabet', () => {
    expect(CODE_ALPHABET).toHaveLength(62);
    expect(new Set(CODE_ALPHABET).size).toBe(62);
  });

  it('maps random values onto alphabet symbols', () => {
    const random = makeFixedRandom(['A', 'b', '3', 'X', 'y', '9'].map(bucket));
    const generator = makeRandomCodeGenerator({ random });

    expect(generator.generate()).toBe('Ab3Xy9');
  });

  it('maps the lowest value to the first symbol', () => {
    const generator = makeRandomCodeGenerator({ random: () => 0 });

    expect(generator.generate()).toBe('AAAAAA');
  });

  it('never indexes past the last symbol', () => {
    const generator = makeRandomCodeGenerator({ random: () => 1 });

    expect(generator.generate()).toBe('999999');
  });

  it('always produces CODE_LENGTH symbols', () => {
    const generator = makeRandomCodeGenerator({ random: () => 0.5 });

    expect(generator.generate()).toHaveLength(CODE_LENGTH);
    expect(CODE_LENGTH).toBe(6);
  });

  it('produces well-formed codes with the default random source', () => {
    const generator = makeRandomCodeGenerator();

    for (let i = 0; i < 500; i++) {
      expect(generator.generate()).toMatch(CODE_PATTERN);
    }
  });

  it('produces varied codes with the default random source', () => {
    const generator = makeRandomCodeGenerator();
    const codes = new Set(Array.from({ length: 200 }, () => generator.generate()));

    expect(codes.size).toBeGreaterThan(190);
  });
});
