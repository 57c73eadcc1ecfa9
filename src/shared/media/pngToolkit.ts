import { PNG } from 'pngjs';

import { fingerprintBuffer } from './gifToolkit.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export interface DecodedPng {
  width: number;
  height: number;
  data: Uint8ClampedArray;
  fingerprint: string;
}

export function isPngBuffer(buffer: Buffer): boolean {
  return buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE);
}

/** Decodes a still PNG into 8-bit RGBA, whatever its stored color type. */
export function decodePng(buffer: Buffer): DecodedPng {
  if (!isPngBuffer(buffer)) {
    throw new TypeError('Input does not carry a PNG signature');
  }

  const png = PNG.sync.read(buffer);

  return {
    width: png.width,
    height: png.height,
    data: new Uint8ClampedArray(png.data),
    fingerprint: fingerprintBuffer(buffer),
  };
}
