import { describe, it, expect } from 'vitest';
import { generateScramble } from './scramble';
import { ScrambleLengthError } from './errors';
import { formatAlgorithm } from '../notation/notation';

/** Replays the given values in order, then repeats the last one */
const sequence = (...values: number[]) => {
  let i = 0;
  return () => values[Math.min(i++, values.length - 1)];
};

describe('generateScramble', () => {
  it('uses the configured default length', () => {
    expect(generateScramble()).toHaveLength(10);
  });

  it('alternates faces with a source that always picks the first option', () => {
    expect(formatAlgorithm(generateScramble(4, () => 0))).toBe('U D U D');
  });

  it('picks the last option for values just below one', () => {
    expect(formatAlgorithm(generateScramble(3, () => 0.999))).toBe("R' L' R'");
  });

  it('skips the previous face when picking the next one', () => {
    // face, direction pairs: front cw, then index 2 of [up, down, back, left, right] = back
    const random = sequence(0.4, 0, 0.5, 0.5);
    expect(formatAlgorithm(generateScramble(2, random))).toBe("F B'");
  });

  it('never turns the same face twice in a row', () => {
    const moves = generateScramble(200);
    for (let i = 1; i < moves.length; i++) {
      expect(moves[i].face).not.toBe(moves[i - 1].face);
    }
  });

  it('returns an empty scramble for length 0', () => {
    expect(generateScramble(0)).toEqual([]);
  });

  it.each([-1, 1.5, Number.NaN])('rejects length %s', (length) => {
    expect(() => generateScramble(length)).toThrow(ScrambleLengthError);
  });
});
