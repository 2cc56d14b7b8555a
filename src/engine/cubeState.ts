/**
 * Cube state values and the Facelet State Store
 *
 * A CubeState is a frozen 24-entry color array. The store holds exactly one
 * of them and only ever swaps it for another whole value, so a reader that
 * took a snapshot keeps a consistent picture no matter what happens next.
 */

import {
  ALL_COLORS,
  ALL_FACES,
  FACELET_COUNT,
  type Color,
  type CubeState,
  type Face,
  type FaceletAddress,
  type FaceletEntry,
} from './types';
import { ALL_ADDRESSES, addressIndex, faceAddresses } from './addresses';
import { InvalidStateError } from './errors';
import { SOLVED_FACE_COLORS } from '../config/colors';

const PALETTE = new Set<string>(ALL_COLORS);

function isColor(value: unknown): value is Color {
  return typeof value === 'string' && PALETTE.has(value);
}

/**
 * Build a state from 24 colors in canonical address order.
 * The input is copied, so later edits to it cannot leak into the state.
 */
export function createState(facelets: readonly unknown[]): CubeState {
  if (facelets.length !== FACELET_COUNT) {
    throw new InvalidStateError(`Expected ${FACELET_COUNT} facelets, got ${facelets.length}`);
  }
  const colors: Color[] = [];
  facelets.forEach((value, index) => {
    if (!isColor(value)) {
      throw new InvalidStateError(`Facelet ${index} has unknown color ${String(value)}`);
    }
    colors.push(value);
  });
  return Object.freeze({ facelets: Object.freeze(colors) });
}

export function createSolvedState(): CubeState {
  return createState(ALL_ADDRESSES.map((address) => SOLVED_FACE_COLORS[address.face]));
}

export function getFacelet(state: CubeState, address: FaceletAddress): Color {
  return state.facelets[addressIndex(address)];
}

export function getFaceColors(state: CubeState, face: Face): Color[] {
  return faceAddresses(face).map((address) => getFacelet(state, address));
}

/**
 * Solved when every face is a single color and no two faces share one.
 */
export function isSolvedState(state: CubeState): boolean {
  const seen = new Set<Color>();
  for (const face of ALL_FACES) {
    const [first, ...rest] = getFaceColors(state, face);
    if (rest.some((color) => color !== first)) return false;
    if (seen.has(first)) return false;
    seen.add(first);
  }
  return true;
}

export function statesEqual(a: CubeState, b: CubeState): boolean {
  if (a === b) return true;
  return a.facelets.every((color, index) => b.facelets[index] === color);
}

export function listFacelets(state: CubeState): FaceletEntry[] {
  return ALL_ADDRESSES.map((address) => ({ address, color: getFacelet(state, address) }));
}

// =============================================================================
// Facelet State Store
// =============================================================================

export class FaceletStore {
  private _state: CubeState;

  constructor(initial: CubeState = createSolvedState()) {
    this._state = adoptState(initial);
  }

  get(address: FaceletAddress): Color {
    return getFacelet(this._state, address);
  }

  /**
   * Replace the whole assignment in one step. Values built elsewhere are
   * re-validated so a malformed state can never become current.
   */
  setAll(next: CubeState): void {
    this._state = adoptState(next);
  }

  snapshot(): CubeState {
    return this._state;
  }

  isSolved(): boolean {
    return isSolvedState(this._state);
  }

  clone(): FaceletStore {
    return new FaceletStore(this._state);
  }
}

/** Frozen, well-formed values are shared as-is; anything else is copied */
function adoptState(state: CubeState): CubeState {
  const shareable =
    Object.isFrozen(state) &&
    Object.isFrozen(state.facelets) &&
    state.facelets.length === FACELET_COUNT &&
    state.facelets.every(isColor);
  return shareable ? state : createState(state.facelets);
}
