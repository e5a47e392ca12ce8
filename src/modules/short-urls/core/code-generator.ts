/**
 * Short URLs Module - Code Generation
 *
 * Random short code proposals. Uniqueness matters more than unpredictability,
 * so the random source does not need to be cryptographically secure.
 */

import { CODE_ALPHABET, CODE_LENGTH } from './types.js';

import type { CodeGenerator } from './ports.js';

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

export interface RandomCodeGeneratorOptions {
  /** Defaults to Math.random */
  random?: RandomSource;
}

/**
 * Picks one alphabet symbol from a random number in [0, 1).
 */
const pickSymbol = (random: RandomSource): string => {
  const index = Math.min(Math.floor(random() * CODE_ALPHABET.length), CODE_ALPHABET.length - 1);
  return CODE_ALPHABET.charAt(index);
};

/**
 * Creates a generator of codes drawn uniformly from the 62-symbol alphabet.
 *
 * Generation never looks at the store; collisions surface as DuplicateCodeError
 * from UrlStore.insert and are retried by the shorten use case.
 */
export const makeRandomCodeGenerator = (options: RandomCodeGeneratorOptions = {}): CodeGenerator => {
  const random = options.random ?? Math.random;

  return {
    generate(): string {
      let code = '';
      for (let i = 0; i < CODE_LENGTH; i++) {
        code += pickSymbol(random);
      }
      return code;
    },
  };
};
