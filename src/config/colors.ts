/**
 * Centralized color configuration.
 * Sticker palette, solved face assignment and the cubie body color live here.
 */

import type { Color, Face } from '../engine/types';

export interface ColorConfig {
  // ===== Sticker Palette =====
  stickers: Record<Color, string>;

  // ===== Cubie Body =====
  inside: string;              // Plastic between stickers
}

/** Color each face shows when the cube is solved */
export const SOLVED_FACE_COLORS: Readonly<Record<Face, Color>> = {
  up: 'white',
  down: 'yellow',
  front: 'red',
  back: 'orange',
  right: 'blue',
  left: 'green',
};

// ===== Default Theme =====
export const defaultColors: ColorConfig = {
  stickers: {
    white: '#ffffff',
    yellow: '#ffff00',
    red: '#ff0000',
    orange: '#ff8000',
    blue: '#0000ff',
    green: '#00cc00',
  },

  inside: '#1a1a1a',
};

/**
 * Get colors for the current theme.
 */
export function getColors(): ColorConfig {
  return defaultColors;
}

export function stickerHex(color: Color): string {
  return getColors().stickers[color];
}
