/**
 * Engine Module - Public API
 *
 * The facelet permutation engine for the pocket cube:
 * - Immutable cube state values and the Facelet State Store
 * - Move tables, derived once and validated before use
 * - Move executor (value API) and the session Engine (action API)
 */

// Session engine
export { Engine, createEngine } from './Engine';

// Value API
export {
  newSession,
  apply,
  applyMove,
  applySequence,
  isSolved,
  faceletColor,
} from './executor';

// State
export {
  FaceletStore,
  createState,
  createSolvedState,
  getFacelet,
  getFaceColors,
  isSolvedState,
  statesEqual,
  listFacelets,
} from './cubeState';

// Addresses
export {
  ALL_ADDRESSES,
  facelet,
  faceAddresses,
  addressIndex,
  addressKey,
  resolveAddress,
  isFace,
  isFaceletIndex,
} from './addresses';

// Moves
export {
  ALL_MOVES,
  move,
  toMove,
  moveKey,
  invertMove,
  invertSequence,
  isTurnDirection,
} from './moves';

// Move tables
export { FACE_NEIGHBORS, deriveMoveTable, getMoveTable, listMoveTables } from './moveTables';
export type { NeighborEdge } from './moveTables';
export {
  MoveTableChecker,
  checkMoveTables,
  assertValidMoveTables,
  formatMoveTableCheckResult,
} from './validators/MoveTableChecker';
export type {
  MoveTableRuleId,
  MoveTableValidationError,
  MoveTableCheckResult,
} from './validators/MoveTableChecker';

// Scrambles
export { generateScramble } from './scramble';
export type { RandomSource } from './scramble';

// Errors
export {
  UnknownMoveError,
  FaceletAddressError,
  InvalidStateError,
  ScrambleLengthError,
  StateDecodeError,
  MoveTableError,
} from './errors';

// Types
export * from './types';
