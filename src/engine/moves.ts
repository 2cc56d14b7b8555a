/**
 * Move identifiers and their algebra (inverse, sequence inverse).
 */

import { ALL_DIRECTIONS, ALL_FACES, type Face, type Move, type TurnDirection } from './types';
import { isFace } from './addresses';
import { UnknownMoveError } from './errors';

/** All 12 moves, interned: `move()` returns these same frozen objects */
export const ALL_MOVES: readonly Move[] = Object.freeze(
  ALL_FACES.flatMap((face) => ALL_DIRECTIONS.map((direction) => Object.freeze({ face, direction })))
);

export function isTurnDirection(value: unknown): value is TurnDirection {
  return value === 'cw' || value === 'ccw';
}

export function move(face: Face, direction: TurnDirection): Move {
  const found = ALL_MOVES.find((m) => m.face === face && m.direction === direction);
  if (!found) {
    throw new UnknownMoveError(`${String(face)}:${String(direction)}`);
  }
  return found;
}

/**
 * Check a value arriving from outside the type system (deserialized data,
 * untyped callers) and return the interned move.
 */
export function toMove(value: unknown): Move {
  if (typeof value === 'object' && value !== null && 'face' in value && 'direction' in value) {
    const { face, direction } = value;
    if (isFace(face) && isTurnDirection(direction)) {
      return move(face, direction);
    }
  }
  throw new UnknownMoveError(describe(value));
}

export function moveKey(m: Move): string {
  return `${m.face}:${m.direction}`;
}

export function invertMove(m: Move): Move {
  return move(m.face, m.direction === 'cw' ? 'ccw' : 'cw');
}

/** Reverse the order and invert each move */
export function invertSequence(moves: readonly Move[]): Move[] {
  return moves.map(invertMove).reverse();
}

function describe(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
