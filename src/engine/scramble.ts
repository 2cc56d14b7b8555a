/**
 * Random scrambles: uniformly chosen quarter turns, never turning the same
 * face twice in a row (that would merge or cancel turns).
 */

import { ALL_DIRECTIONS, ALL_FACES, type Face, type Move } from './types';
import { move } from './moves';
import { ScrambleLengthError } from './errors';
import { DEFAULT_CONFIG } from '../config/defaults';
import { debug } from '../utils/debug';

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

function pick<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

export function generateScramble(
  length: number = DEFAULT_CONFIG.scrambleLength,
  random: RandomSource = Math.random
): Move[] {
  if (!Number.isInteger(length) || length < 0) {
    throw new ScrambleLengthError(length);
  }

  const moves: Move[] = [];
  let previous: Face | null = null;
  for (let i = 0; i < length; i++) {
    const candidates = ALL_FACES.filter((face) => face !== previous);
    const face = pick(candidates, random);
    moves.push(move(face, pick(ALL_DIRECTIONS, random)));
    previous = face;
  }

  debug('scramble', `generated ${moves.length} moves`);
  return moves;
}
