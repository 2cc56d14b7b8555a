/**
 * Sticker Layout - 3D placement of every facelet
 *
 * The cube spans -1..1 on each axis and is made of eight unit cubies.
 * Sticker centers sit on the face planes (distance 1 from the origin) at
 * ±0.5 along the face's right and up directions. Each face is described
 * as seen from outside the cube:
 *
 *   face    normal   up       right
 *   up      +Y       -Z       +X
 *   down    -Y       +X       -Z
 *   front   +Z       +Y       +X
 *   back    -Z       +Y       -X
 *   left    -X       +Y       +Z
 *   right   +X       +Y       -Z
 *
 * Renderers read placements from here; the move-table checker rotates them
 * to confirm every table is a real quarter turn.
 */

import { Quaternion, Vector3 } from 'three';
import type { Face, FaceletAddress, Move } from '../engine/types';
import { ALL_ADDRESSES } from '../engine/addresses';
import { DEFAULT_CONFIG } from '../config/defaults';

type Triple = readonly [number, number, number];

interface FaceFrameVectors {
  normal: Triple;
  up: Triple;
  right: Triple;
}

const FACE_FRAMES: Readonly<Record<Face, FaceFrameVectors>> = {
  up: { normal: [0, 1, 0], up: [0, 0, -1], right: [1, 0, 0] },
  down: { normal: [0, -1, 0], up: [1, 0, 0], right: [0, 0, -1] },
  front: { normal: [0, 0, 1], up: [0, 1, 0], right: [1, 0, 0] },
  back: { normal: [0, 0, -1], up: [0, 1, 0], right: [-1, 0, 0] },
  left: { normal: [-1, 0, 0], up: [0, 1, 0], right: [0, 0, 1] },
  right: { normal: [1, 0, 0], up: [0, 1, 0], right: [0, 0, -1] },
};

const POSITION_TOLERANCE = 1e-6;

export interface FaceFrame {
  normal: Vector3;
  up: Vector3;
  right: Vector3;
}

export interface StickerPlacement {
  position: Vector3;
  normal: Vector3;
}

export type Axis = 'x' | 'y' | 'z';

export function getFaceFrame(face: Face): FaceFrame {
  const frame = FACE_FRAMES[face];
  return {
    normal: new Vector3(...frame.normal),
    up: new Vector3(...frame.up),
    right: new Vector3(...frame.right),
  };
}

export function getStickerPlacement(address: FaceletAddress): StickerPlacement {
  const { normal, up, right } = getFaceFrame(address.face);
  const position = normal
    .clone()
    .addScaledVector(right, address.col === 0 ? -0.5 : 0.5)
    .addScaledVector(up, address.row === 0 ? 0.5 : -0.5);
  return { position, normal };
}

/**
 * Corners of the visible sticker quad, counter-clockwise as seen from
 * outside (the winding three.js treats as front-facing).
 */
export function getStickerCorners(
  address: FaceletAddress,
  size: number = DEFAULT_CONFIG.stickerSize
): Vector3[] {
  const { up, right } = getFaceFrame(address.face);
  const { position } = getStickerPlacement(address);
  const half = size / 2;
  return [
    [-half, -half],
    [half, -half],
    [half, half],
    [-half, half],
  ].map(([dx, dy]) => position.clone().addScaledVector(right, dx).addScaledVector(up, dy));
}

/** World axis a face turns about, and which layer along it */
export function getFaceAxis(face: Face): { axis: Axis; layer: 1 | -1 } {
  const [x, y, z] = FACE_FRAMES[face].normal;
  if (x !== 0) return { axis: 'x', layer: x > 0 ? 1 : -1 };
  if (y !== 0) return { axis: 'y', layer: y > 0 ? 1 : -1 };
  return { axis: 'z', layer: z > 0 ? 1 : -1 };
}

/**
 * Rotation of a quarter turn. Clockwise as seen from outside the face is a
 * negative angle about its outward normal.
 */
export function getTurnRotation(move: Move): Quaternion {
  const { normal } = getFaceFrame(move.face);
  const angle = move.direction === 'cw' ? -Math.PI / 2 : Math.PI / 2;
  return new Quaternion().setFromAxisAngle(normal, angle);
}

/** Whether a sticker lies in the layer a face turn carries along */
export function isInTurnLayer(address: FaceletAddress, face: Face): boolean {
  const { normal } = getFaceFrame(face);
  return getStickerPlacement(address).position.dot(normal) > POSITION_TOLERANCE;
}

export function rotatePlacement(placement: StickerPlacement, rotation: Quaternion): StickerPlacement {
  return {
    position: placement.position.clone().applyQuaternion(rotation),
    normal: placement.normal.clone().applyQuaternion(rotation),
  };
}

export function findAddressAt(position: Vector3, normal: Vector3): FaceletAddress | null {
  for (const address of ALL_ADDRESSES) {
    const placement = getStickerPlacement(address);
    if (
      placement.position.distanceTo(position) < POSITION_TOLERANCE &&
      placement.normal.distanceTo(normal) < POSITION_TOLERANCE
    ) {
      return address;
    }
  }
  return null;
}
