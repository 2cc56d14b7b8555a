/**
 * Move notation
 *
 * One letter per face: U D F B L R.
 *   F    clockwise
 *   F'   counter-clockwise (a typographic ’ is accepted too)
 *   f    counter-clockwise
 *   F2   two clockwise turns
 *
 * Moves may be separated by whitespace or commas, or run together
 * ("RUR'U'"). A lowercase letter takes no modifier.
 */

import type { Face, Move } from '../engine/types';
import { move } from '../engine/moves';
import { UnknownMoveError } from '../engine/errors';

const FACE_LETTERS = new Map<string, Face>([
  ['U', 'up'],
  ['D', 'down'],
  ['F', 'front'],
  ['B', 'back'],
  ['L', 'left'],
  ['R', 'right'],
]);

const LETTER_FOR_FACE: Readonly<Record<Face, string>> = {
  up: 'U',
  down: 'D',
  front: 'F',
  back: 'B',
  left: 'L',
  right: 'R',
};

const PRIMES = new Set(["'", '’']);
const DOUBLE = '2';

const isSeparator = (ch: string): boolean => ch === ',' || /\s/.test(ch);

/** Text from `start` up to the next separator, for error messages */
function tokenAt(text: string, start: number): string {
  let end = start + 1;
  while (end < text.length && !isSeparator(text[end])) end++;
  return text.slice(start, end);
}

/**
 * Parse an algorithm into quarter-turn moves.
 * Throws UnknownMoveError with the offending token and its offset.
 */
export function parseAlgorithm(text: string): Move[] {
  const moves: Move[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (isSeparator(ch)) {
      i++;
      continue;
    }

    const start = i;
    const face = FACE_LETTERS.get(ch.toUpperCase());
    if (!face) {
      throw new UnknownMoveError(tokenAt(text, start), start);
    }
    const lowercase = ch !== ch.toUpperCase();
    i++;

    const modifier = text[i];
    if (modifier !== undefined && (PRIMES.has(modifier) || modifier === DOUBLE)) {
      if (lowercase) {
        throw new UnknownMoveError(text.slice(start, i + 1), start);
      }
      i++;
      if (modifier === DOUBLE) {
        moves.push(move(face, 'cw'), move(face, 'cw'));
      } else {
        moves.push(move(face, 'ccw'));
      }
      continue;
    }

    moves.push(move(face, lowercase ? 'ccw' : 'cw'));
  }

  return moves;
}

/**
 * Parse exactly one quarter turn, e.g. "F" or "F'".
 */
export function parseMove(token: string): Move {
  const trimmed = token.trim();
  const moves = parseAlgorithm(trimmed);
  if (moves.length !== 1) {
    throw new UnknownMoveError(trimmed);
  }
  return moves[0];
}

export function formatMove(m: Move): string {
  return LETTER_FOR_FACE[m.face] + (m.direction === 'ccw' ? "'" : '');
}

export function formatAlgorithm(moves: readonly Move[]): string {
  return moves.map(formatMove).join(' ');
}
