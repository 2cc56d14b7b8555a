/**
 * Move Table Registry
 *
 * One permutation table per (face, direction), derived from a single
 * adjacency table and validated before anything can use it. If validation
 * fails this module throws while loading, so no engine ever runs on a
 * suspect table.
 *
 * Derivation, for a turned face X:
 * 1. Walk X's edges clockwise (top, right, bottom, left as seen from outside).
 * 2. On each edge take the neighbor's two touching facelets, ordered
 *    clockwise around X. That is counter-clockwise around the neighbor,
 *    since two faces traverse their shared edge in opposite directions.
 * 3. Clockwise sends strip k to strip k + 1 element by element (two 4-cycles),
 *    and rotates X's own corners 00 -> 01 -> 11 -> 10 (one 4-cycle).
 * 4. Counter-clockwise reverses every cycle.
 */

import {
  FACE_EDGES,
  type Face,
  type FaceEdge,
  type FaceletAddress,
  type FaceletIndex,
  type Move,
  type MoveTable,
  type PermutationCycle,
} from './types';
import { addressIndex, facelet } from './addresses';
import { ALL_MOVES, moveKey, toMove } from './moves';
import { UnknownMoveError } from './errors';
import { assertValidMoveTables } from './validators/MoveTableChecker';
import { debug } from '../utils/debug';

// =============================================================================
// Geometry
// =============================================================================

export interface NeighborEdge {
  face: Face;
  /** Which of the neighbor's own edges touches the turned face */
  edge: FaceEdge;
}

/**
 * Neighbors of each face, in the order of its own top, right, bottom and
 * left edges. Must stay consistent with the face frames in stickerLayout.
 */
export const FACE_NEIGHBORS: Readonly<Record<Face, readonly NeighborEdge[]>> = {
  up: [
    { face: 'back', edge: 'top' },
    { face: 'right', edge: 'top' },
    { face: 'front', edge: 'top' },
    { face: 'left', edge: 'top' },
  ],
  down: [
    { face: 'right', edge: 'bottom' },
    { face: 'back', edge: 'bottom' },
    { face: 'left', edge: 'bottom' },
    { face: 'front', edge: 'bottom' },
  ],
  front: [
    { face: 'up', edge: 'bottom' },
    { face: 'right', edge: 'left' },
    { face: 'down', edge: 'left' },
    { face: 'left', edge: 'right' },
  ],
  back: [
    { face: 'up', edge: 'top' },
    { face: 'left', edge: 'left' },
    { face: 'down', edge: 'right' },
    { face: 'right', edge: 'right' },
  ],
  left: [
    { face: 'up', edge: 'left' },
    { face: 'front', edge: 'left' },
    { face: 'down', edge: 'bottom' },
    { face: 'back', edge: 'right' },
  ],
  right: [
    { face: 'up', edge: 'right' },
    { face: 'back', edge: 'left' },
    { face: 'down', edge: 'top' },
    { face: 'front', edge: 'right' },
  ],
};

type Cell = readonly [row: FaceletIndex, col: FaceletIndex];

/** The two facelets along each edge, in clockwise order around their own face */
const EDGE_CELLS: Readonly<Record<FaceEdge, readonly [Cell, Cell]>> = {
  top: [[0, 0], [0, 1]],
  right: [[0, 1], [1, 1]],
  bottom: [[1, 1], [1, 0]],
  left: [[1, 0], [0, 0]],
};

/** Corners of a face in clockwise order, starting top-left */
const CORNER_CYCLE: readonly Cell[] = FACE_EDGES.map((edge) => EDGE_CELLS[edge][0]);

function neighborStrip(neighbor: NeighborEdge): FaceletAddress[] {
  return [...EDGE_CELLS[neighbor.edge]]
    .reverse()
    .map(([row, col]) => facelet(neighbor.face, row, col));
}

// =============================================================================
// Derivation
// =============================================================================

export function deriveMoveTable(m: Move): MoveTable {
  const strips = FACE_NEIGHBORS[m.face].map(neighborStrip);
  const clockwise: PermutationCycle[] = [
    strips.map((strip) => strip[0]),
    strips.map((strip) => strip[1]),
    CORNER_CYCLE.map(([row, col]) => facelet(m.face, row, col)),
  ];
  const cycles = m.direction === 'cw'
    ? clockwise
    : clockwise.map((cycle) => [...cycle].reverse());

  const transfers: (readonly [number, number])[] = [];
  for (const cycle of cycles) {
    cycle.forEach((from, i) => {
      const to = cycle[(i + 1) % cycle.length];
      transfers.push([addressIndex(from), addressIndex(to)]);
    });
  }

  return Object.freeze({
    move: m,
    cycles: Object.freeze(cycles.map((cycle) => Object.freeze(cycle))),
    workingSet: Object.freeze(cycles.flat()),
    transfers: Object.freeze(transfers),
  });
}

// =============================================================================
// Registry
// =============================================================================

function buildRegistry(): ReadonlyMap<string, MoveTable> {
  const tables = ALL_MOVES.map(deriveMoveTable);
  assertValidMoveTables(tables);
  debug('registry', `${tables.length} move tables validated`);
  return new Map(tables.map((table) => [moveKey(table.move), table]));
}

const MOVE_TABLES = buildRegistry();

/**
 * Look up a move's table. Typed callers always succeed; a value smuggled
 * past the type system raises UnknownMoveError.
 */
export function getMoveTable(m: Move): MoveTable {
  const table = MOVE_TABLES.get(moveKey(toMove(m)));
  if (!table) {
    throw new UnknownMoveError(moveKey(m));
  }
  return table;
}

export function listMoveTables(): MoveTable[] {
  return Array.from(MOVE_TABLES.values());
}
