import { clampToByte } from './numberUtils.js';

export function toHexColor(red: number, green: number, blue: number): string {
  const packed = (clampToByte(red) << 16) | (clampToByte(green) << 8) | clampToByte(blue);
  return `#${packed.toString(16).padStart(6, '0').toUpperCase()}`;
}

/** Reads the RGB channels at `index` of an RGBA buffer; alpha is not part of the color. */
export function hexColorAt(data: Uint8ClampedArray, index: number): string {
  return toHexColor(data[index] ?? 0, data[index + 1] ?? 0, data[index + 2] ?? 0);
}
