/**
 * Algebraic laws of the move set
 *
 * Every move is checked against every starting state, so a single wrong
 * table entry fails by name.
 */

import { describe, it, expect } from 'vitest';
import { applyMove, applySequence } from '../../src/engine/executor';
import { createSolvedState, isSolvedState, listFacelets, statesEqual } from '../../src/engine/cubeState';
import { addressKey } from '../../src/engine/addresses';
import { ALL_MOVES, invertMove, invertSequence, move, moveKey } from '../../src/engine/moves';
import { parseAlgorithm } from '../../src/notation/notation';
import { encodeFacelets } from '../../src/utils/stateCodec';
import { ALL_FACES, OPPOSITE_FACE, type CubeState, type Move } from '../../src/engine/types';
import { permute } from '../fixtures/permute';
import { SCRAMBLES, startingStates } from '../fixtures/states';

const matrix = permute(
  { move: ALL_MOVES, start: startingStates() },
  ({ move: m, start: [name] }) => `${moveKey(m)} from ${name}`
);

const sortedColors = (state: CubeState): string[] => [...state.facelets].sort();

/** Number of repetitions of a sequence needed to return to solved */
function orderOf(moves: readonly Move[]): number {
  let state = applySequence(createSolvedState(), moves);
  let count = 1;
  while (!isSolvedState(state) && count < 1000) {
    state = applySequence(state, moves);
    count++;
  }
  return count;
}

describe('single moves', () => {
  it.each(matrix)('%s: inverse undoes the move', (_name, { move: m, start: [, state] }) => {
    expect(statesEqual(applyMove(applyMove(state, m), invertMove(m)), state)).toBe(true);
  });

  it.each(matrix)('%s: four turns are the identity', (_name, { move: m, start: [, state] }) => {
    expect(statesEqual(applySequence(state, [m, m, m, m]), state)).toBe(true);
  });

  it.each(matrix)('%s: two turns are not the identity', (_name, { move: m, start: [, state] }) => {
    expect(statesEqual(applySequence(state, [m, m]), state)).toBe(false);
  });

  it.each(matrix)('%s: keeps the color multiset', (_name, { move: m, start: [, state] }) => {
    expect(sortedColors(applyMove(state, m))).toEqual(sortedColors(state));
  });

  it.each(ALL_MOVES.map((m): [string, Move] => [moveKey(m), m]))('%s changes 8 facelets of a solved cube', (_name, m) => {
    const before = createSolvedState();
    const after = applyMove(before, m);
    // on a solved cube the turned face keeps its color, so only the 8 side facelets differ
    const changed = after.facelets.filter((color, i) => color !== before.facelets[i]);
    expect(changed).toHaveLength(8);
  });
});

describe('opposite faces', () => {
  const pairs = ALL_FACES.filter((face) => face < OPPOSITE_FACE[face]);

  it.each(pairs)('%s commutes with its opposite', (face) => {
    for (const [, state] of startingStates()) {
      const a = move(face, 'cw');
      const b = move(OPPOSITE_FACE[face], 'cw');
      expect(statesEqual(applySequence(state, [a, b]), applySequence(state, [b, a]))).toBe(true);
    }
  });

  it('adjacent faces do not commute', () => {
    const r = move('right', 'cw');
    const u = move('up', 'cw');
    const start = createSolvedState();
    expect(statesEqual(applySequence(start, [r, u]), applySequence(start, [u, r]))).toBe(false);
  });
});

describe('sequences', () => {
  it.each(Object.entries(SCRAMBLES))('%s scramble is undone by its inverse', (_name, notation) => {
    const moves = parseAlgorithm(notation);
    const scrambled = applySequence(createSolvedState(), moves);
    expect(isSolvedState(scrambled)).toBe(false);
    expect(isSolvedState(applySequence(scrambled, invertSequence(moves)))).toBe(true);
  });

  it.each(startingStates())('%s state still lists all 24 addresses once', (_name, state) => {
    const entries = listFacelets(state);
    expect(entries).toHaveLength(24);
    expect(new Set(entries.map((entry) => addressKey(entry.address))).size).toBe(24);
  });

  it("R U R' U' has order 6", () => {
    expect(orderOf(parseAlgorithm("R U R' U'"))).toBe(6);
  });

  it('R U has order 15', () => {
    expect(orderOf(parseAlgorithm('R U'))).toBe(15);
  });

  it('U from solved cycles the top rows', () => {
    expect(encodeFacelets(applyMove(createSolvedState(), move('up', 'cw')))).toBe('UUUUDDDDRRFFLLBBFFLLBBRR');
  });
});
