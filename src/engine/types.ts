/**
 * Engine Types
 *
 * Core value types for the pocket cube model. Everything here is immutable:
 * states are replaced wholesale by the executor, never edited in place.
 */

// =============================================================================
// Faces and Addresses
// =============================================================================

export type Face = 'up' | 'down' | 'front' | 'back' | 'left' | 'right';

/** Canonical face order. Address indices and facelet strings follow it. */
export const ALL_FACES: readonly Face[] = ['up', 'down', 'front', 'back', 'left', 'right'];

export const OPPOSITE_FACE: Readonly<Record<Face, Face>> = {
  up: 'down',
  down: 'up',
  front: 'back',
  back: 'front',
  left: 'right',
  right: 'left',
};

/** Row or column within a face (0 = top/left as seen from outside the cube) */
export type FaceletIndex = 0 | 1;

export interface FaceletAddress {
  readonly face: Face;
  readonly row: FaceletIndex;
  readonly col: FaceletIndex;
}

/** Edges of a face, listed clockwise as seen from outside */
export type FaceEdge = 'top' | 'right' | 'bottom' | 'left';

export const FACE_EDGES: readonly FaceEdge[] = ['top', 'right', 'bottom', 'left'];

export const FACELETS_PER_FACE = 4;
export const FACELET_COUNT = ALL_FACES.length * FACELETS_PER_FACE;

// =============================================================================
// Colors and State
// =============================================================================

export type Color = 'white' | 'yellow' | 'red' | 'orange' | 'blue' | 'green';

export const ALL_COLORS: readonly Color[] = ['white', 'yellow', 'red', 'orange', 'blue', 'green'];

/**
 * Complete cube state: one color per facelet, indexed by canonical
 * address index (see `addressIndex`). Always exactly 24 entries.
 */
export interface CubeState {
  readonly facelets: readonly Color[];
}

export interface FaceletEntry {
  readonly address: FaceletAddress;
  readonly color: Color;
}

// =============================================================================
// Moves and Permutations
// =============================================================================

export type TurnDirection = 'cw' | 'ccw';

export const ALL_DIRECTIONS: readonly TurnDirection[] = ['cw', 'ccw'];

export interface Move {
  readonly face: Face;
  readonly direction: TurnDirection;
}

/** Color at cycle[i] moves to cycle[(i + 1) % length] */
export type PermutationCycle = readonly FaceletAddress[];

export interface MoveTable {
  readonly move: Move;
  /** Two side cycles followed by the turned face's own rotation */
  readonly cycles: readonly PermutationCycle[];
  /** Every address the move touches, in cycle order */
  readonly workingSet: readonly FaceletAddress[];
  /** Precomputed [from, to] address index pairs */
  readonly transfers: readonly (readonly [number, number])[];
}

// =============================================================================
// Session Engine
// =============================================================================

export type EngineAction =
  | { type: 'APPLY_MOVE'; payload: Move }
  | { type: 'APPLY_SEQUENCE'; payload: { moves: readonly Move[] } }
  | { type: 'APPLY_ALGORITHM'; payload: { notation: string } }
  | { type: 'UNDO' }
  | { type: 'REDO' }
  | { type: 'SCRAMBLE'; payload?: { length?: number; random?: () => number } }
  | { type: 'RESET' }
  | { type: 'LOAD_STATE'; payload: { state: CubeState; history?: readonly Move[] } };

export interface EngineSnapshot {
  state: CubeState;
  solved: boolean;
  history: readonly Move[];
  canUndo: boolean;
  canRedo: boolean;
  previewing: boolean;
}
