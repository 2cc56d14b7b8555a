import { describe, it, expect } from 'vitest';
import { SOLVED_FACE_COLORS, defaultColors, getColors, stickerHex } from './colors';
import { ALL_COLORS, ALL_FACES, type Color } from '../engine/types';

const expectedHex: [Color, string][] = [
  ['white', '#ffffff'],
  ['yellow', '#ffff00'],
  ['red', '#ff0000'],
  ['orange', '#ff8000'],
  ['blue', '#0000ff'],
  ['green', '#00cc00'],
];

describe('colors', () => {
  it.each(expectedHex)('%s stickers render as %s', (color, hex) => {
    expect(stickerHex(color)).toBe(hex);
    expect(getColors().stickers[color]).toBe(hex);
  });

  it('has a hex value for every palette color', () => {
    expect(Object.keys(getColors().stickers).sort()).toEqual([...ALL_COLORS].sort());
  });

  it('serves the default theme', () => {
    expect(getColors()).toBe(defaultColors);
    expect(getColors().inside).toBe('#1a1a1a');
  });

  it('gives each face a distinct solved color', () => {
    const colors = ALL_FACES.map((face) => SOLVED_FACE_COLORS[face]);
    expect(new Set(colors).size).toBe(6);
  });
});
