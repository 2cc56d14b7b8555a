/**
 * Facelet addressing
 *
 * Every address is interned: `facelet()` always hands back the same frozen
 * object for the same (face, row, col), so addresses compare by identity.
 */

import {
  ALL_FACES,
  FACELETS_PER_FACE,
  type Face,
  type FaceletAddress,
  type FaceletIndex,
} from './types';
import { FaceletAddressError } from './errors';

const FACE_INDEX: Readonly<Record<Face, number>> = {
  up: 0,
  down: 1,
  front: 2,
  back: 3,
  left: 4,
  right: 5,
};

const INDICES: readonly FaceletIndex[] = [0, 1];

/** All 24 addresses in canonical order */
export const ALL_ADDRESSES: readonly FaceletAddress[] = Object.freeze(
  ALL_FACES.flatMap((face) =>
    INDICES.flatMap((row) => INDICES.map((col) => Object.freeze({ face, row, col })))
  )
);

export function isFace(value: unknown): value is Face {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(FACE_INDEX, value);
}

export function isFaceletIndex(value: unknown): value is FaceletIndex {
  return value === 0 || value === 1;
}

export function addressIndex(address: FaceletAddress): number {
  return FACE_INDEX[address.face] * FACELETS_PER_FACE + address.row * 2 + address.col;
}

export function facelet(face: Face, row: FaceletIndex, col: FaceletIndex): FaceletAddress {
  return ALL_ADDRESSES[FACE_INDEX[face] * FACELETS_PER_FACE + row * 2 + col];
}

/**
 * Resolve an address from unchecked input (renderer queries, decoded data).
 * Throws FaceletAddressError when any coordinate is out of range.
 */
export function resolveAddress(face: unknown, row: unknown, col: unknown): FaceletAddress {
  if (!isFace(face) || !isFaceletIndex(row) || !isFaceletIndex(col)) {
    throw new FaceletAddressError(face, row, col);
  }
  return facelet(face, row, col);
}

export function faceAddresses(face: Face): readonly FaceletAddress[] {
  const start = FACE_INDEX[face] * FACELETS_PER_FACE;
  return ALL_ADDRESSES.slice(start, start + FACELETS_PER_FACE);
}

/** Short, readable key for logs and test names, e.g. `front:10` */
export function addressKey(address: FaceletAddress): string {
  return `${address.face}:${address.row}${address.col}`;
}
