/**
 * Move Executor
 *
 * Every move is computed from an immutable snapshot of the pre-move state
 * and produces a new frozen state. Writing facelets one at a time in cycle
 * order would read values the same move had already overwritten.
 */

import type { Color, CubeState, Face, Move, TurnDirection } from './types';
import { getMoveTable } from './moveTables';
import { createSolvedState, getFacelet, isSolvedState } from './cubeState';
import { resolveAddress } from './addresses';
import { move } from './moves';
import { debug } from '../utils/debug';

export function applyMove(state: CubeState, m: Move): CubeState {
  const table = getMoveTable(m);
  const before = state.facelets;
  const after = before.slice();
  for (const [from, to] of table.transfers) {
    after[to] = before[from];
  }
  debug('move', `${m.face}:${m.direction}`);
  return Object.freeze({ facelets: Object.freeze(after) });
}

/**
 * Fold moves left to right. Every intermediate state is a fresh value, so
 * if any element is rejected the caller's `state` is exactly as it was.
 */
export function applySequence(state: CubeState, moves: readonly Move[]): CubeState {
  debug('sequence', `applying ${moves.length} moves`);
  return moves.reduce<CubeState>((current, m) => applyMove(current, m), state);
}

// =============================================================================
// Session-level value API
// =============================================================================

/** A solved state to start a session from */
export function newSession(): CubeState {
  return createSolvedState();
}

export function apply(state: CubeState, face: Face, direction: TurnDirection): CubeState {
  return applyMove(state, move(face, direction));
}

export function isSolved(state: CubeState): boolean {
  return isSolvedState(state);
}

/**
 * Per-sticker read for renderers. Coordinates come from outside the type
 * system, so they are checked; out-of-range values raise FaceletAddressError.
 */
export function faceletColor(state: CubeState, face: Face, row: number, col: number): Color {
  return getFacelet(state, resolveAddress(face, row, col));
}
