import { describe, it, expect } from 'vitest';
import { apply, applyMove, applySequence, faceletColor, isSolved, newSession } from './executor';
import { createSolvedState, createState, getFaceColors, getFacelet, statesEqual } from './cubeState';
import { facelet } from './addresses';
import { invertMove, invertSequence, move } from './moves';
import { FaceletAddressError, UnknownMoveError } from './errors';
import { encodeFacelets } from '../utils/stateCodec';
import type { Color, Face, Move } from './types';

describe('applyMove', () => {
  it('moves the left strip onto the up face on front clockwise', () => {
    const before = createSolvedState();
    const after = applyMove(before, move('front', 'cw'));

    expect(getFacelet(after, facelet('up', 1, 0))).toBe(getFacelet(before, facelet('left', 1, 1)));
    expect(getFacelet(after, facelet('left', 1, 1))).toBe(getFacelet(before, facelet('down', 0, 0)));
    expect(getFacelet(after, facelet('up', 1, 0))).toBe('green');
    expect(getFacelet(after, facelet('left', 1, 1))).toBe('yellow');
  });

  it('changes exactly the eight side facelets of a solved cube', () => {
    const after = applyMove(createSolvedState(), move('front', 'cw'));
    expect(getFaceColors(after, 'up')).toEqual(['white', 'white', 'green', 'green']);
    expect(getFaceColors(after, 'right')).toEqual(['white', 'blue', 'white', 'blue']);
    expect(getFaceColors(after, 'down')).toEqual(['blue', 'yellow', 'blue', 'yellow']);
    expect(getFaceColors(after, 'left')).toEqual(['green', 'yellow', 'green', 'yellow']);
    expect(getFaceColors(after, 'front')).toEqual(['red', 'red', 'red', 'red']);
    expect(getFaceColors(after, 'back')).toEqual(['orange', 'orange', 'orange', 'orange']);
  });

  it('rotates the turned face among its own facelets', () => {
    // front face painted white, yellow / red, orange; everything else solved
    const colors: Color[] = [...createSolvedState().facelets];
    colors.splice(8, 4, 'white', 'yellow', 'red', 'orange');
    const after = applyMove(createState(colors), move('front', 'cw'));

    expect(getFaceColors(after, 'front')).toEqual(['red', 'white', 'orange', 'yellow']);
  });

  it('rotates the other way counter-clockwise', () => {
    const colors: Color[] = [...createSolvedState().facelets];
    colors.splice(8, 4, 'white', 'yellow', 'red', 'orange');
    const after = applyMove(createState(colors), move('front', 'ccw'));

    expect(getFaceColors(after, 'front')).toEqual(['yellow', 'orange', 'white', 'red']);
  });

  it('produces the expected up clockwise state', () => {
    const after = applyMove(createSolvedState(), move('up', 'cw'));
    expect(encodeFacelets(after)).toBe('UUUUDDDDRRFFLLBBFFLLBBRR');
  });

  it('leaves its input untouched', () => {
    const before = createSolvedState();
    const after = applyMove(before, move('right', 'cw'));
    expect(after).not.toBe(before);
    expect(isSolved(before)).toBe(true);
    expect(Object.isFrozen(after.facelets)).toBe(true);
  });
});

describe('applySequence', () => {
  it('folds moves left to right', () => {
    const moves = [move('right', 'cw'), move('up', 'cw')];
    const folded = applyMove(applyMove(createSolvedState(), moves[0]), moves[1]);
    expect(statesEqual(applySequence(createSolvedState(), moves), folded)).toBe(true);
  });

  it('returns the same state for an empty sequence', () => {
    const state = createSolvedState();
    expect(applySequence(state, [])).toBe(state);
  });

  it('rejects an invalid element without touching the input', () => {
    const start = applyMove(createSolvedState(), move('left', 'cw'));
    const snapshot = encodeFacelets(start);
    const bogus: Move = JSON.parse('{"face":"middle","direction":"cw"}');

    expect(() => applySequence(start, [move('up', 'cw'), bogus, move('down', 'cw')])).toThrow(
      UnknownMoveError
    );
    expect(encodeFacelets(start)).toBe(snapshot);
  });
});

describe('inverses', () => {
  it('flips the direction of a move', () => {
    expect(invertMove(move('back', 'cw'))).toEqual({ face: 'back', direction: 'ccw' });
    expect(invertMove(move('back', 'ccw'))).toEqual({ face: 'back', direction: 'cw' });
  });

  it('reverses and inverts a sequence', () => {
    const moves = [move('right', 'cw'), move('up', 'ccw'), move('front', 'cw')];
    expect(invertSequence(moves)).toEqual([
      { face: 'front', direction: 'ccw' },
      { face: 'up', direction: 'cw' },
      { face: 'right', direction: 'ccw' },
    ]);
  });

  it('does not modify the original sequence', () => {
    const moves = [move('right', 'cw'), move('up', 'ccw')];
    invertSequence(moves);
    expect(moves).toEqual([move('right', 'cw'), move('up', 'ccw')]);
  });
});

describe('session value API', () => {
  it('starts solved and is unsolved after a front turn', () => {
    const state = newSession();
    expect(isSolved(state)).toBe(true);
    expect(isSolved(apply(state, 'front', 'cw'))).toBe(false);
  });

  it('apply matches applyMove', () => {
    const state = newSession();
    expect(statesEqual(apply(state, 'down', 'ccw'), applyMove(state, move('down', 'ccw')))).toBe(true);
  });

  it('reads sticker colors for renderers', () => {
    const state = apply(newSession(), 'front', 'cw');
    expect(faceletColor(state, 'up', 1, 0)).toBe('green');
    expect(faceletColor(state, 'right', 0, 0)).toBe('white');
  });

  it.each([
    ['row 2', 'front', 2, 0],
    ['col -1', 'front', 0, -1],
    ['fractional row', 'front', 0.5, 0],
    ['unknown face', 'top', 0, 0],
  ])('rejects an out-of-range query (%s)', (_name, face, row, col) => {
    const state = newSession();
    const unchecked: Face = JSON.parse(JSON.stringify(face));
    expect(() => faceletColor(state, unchecked, row, col)).toThrow(FaceletAddressError);
  });
});
