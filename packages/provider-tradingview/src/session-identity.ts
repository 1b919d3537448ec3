/**
 * Session identifier generation.
 */

import { randomInt } from 'node:crypto';
import type { SessionIdentity } from './types.js';

const LETTERS = 'abcdefghijklmnopqrstuvwxyz';

const SUFFIX_LENGTH = 12;

/**
 * Returns an integer in [0, max).
 */
export type RandomIndex = (max: number) => number;

const cryptoIndex: RandomIndex = (max) => randomInt(max);

function randomLetters(length: number, random: RandomIndex): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += LETTERS.charAt(random(LETTERS.length));
  }
  return out;
}

/**
 * Generates a fresh quote/chart session pair. Call once per connection.
 *
 * @example
 * ```typescript
 * newSession();
 * // { quoteSession: 'qs_kdlwpqzmxnab', chartSession: 'cs_hqoeyvnrtlsa' }
 * ```
 */
export function newSession(random: RandomIndex = cryptoIndex): SessionIdentity {
  return {
    quoteSession: `qs_${randomLetters(SUFFIX_LENGTH, random)}`,
    chartSession: `cs_${randomLetters(SUFFIX_LENGTH, random)}`,
  };
}
