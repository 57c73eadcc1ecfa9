import { describe, expect, it } from 'vitest';

import { encodeScanlines, type EncoderParameters } from '@domain/stroke-conversion/index.js';

import {
  BLUE,
  GREEN,
  RED,
  TRANSPARENT,
  bitmapFromRows,
  solidBitmap,
  type Rgba,
} from '../../../helpers/bitmaps.js';

const defaults: EncoderParameters = {
  brushThickness: 2,
  samplingStride: 1,
  transparencyThreshold: 10,
};

const withAlpha = (color: Rgba, alpha: number): Rgba => [color[0], color[1], color[2], alpha];

describe('encodeScanlines', () => {
  it('emits a single-point command for an isolated opaque pixel', () => {
    const canvas = bitmapFromRows([[RED, TRANSPARENT]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [0, 0], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('merges a run of identical colors into one command', () => {
    const canvas = bitmapFromRows([[RED, RED, RED]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [2 / 3, 0], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('splits runs on a color change', () => {
    const canvas = bitmapFromRows([[RED, RED, BLUE, BLUE]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [0.25, 0], color: '#FF0000', thickness: 2 },
      { start: [0.5, 0], end: [0.75, 0], color: '#0000FF', thickness: 2 },
    ]);
  });

  it('splits runs on transparency even when the color resumes', () => {
    const canvas = bitmapFromRows([[RED, TRANSPARENT, RED, RED]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [0, 0], color: '#FF0000', thickness: 2 },
      { start: [0.5, 0], end: [0.75, 0], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('spans the whole row for a single constant color', () => {
    const canvas = solidBitmap(7, 1, GREEN);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [6 / 7, 0], color: '#00FF00', thickness: 2 },
    ]);
  });

  it('treats alpha equal to the threshold as transparent', () => {
    const canvas = bitmapFromRows([[withAlpha(RED, 10), withAlpha(RED, 11)]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0.5, 0], end: [0.5, 0], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('ignores alpha differences above the threshold when comparing colors', () => {
    const canvas = bitmapFromRows([[withAlpha(BLUE, 255), withAlpha(BLUE, 100)]]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0], end: [0.5, 0], color: '#0000FF', thickness: 2 },
    ]);
  });

  it('emits nothing for rows without opaque pixels', () => {
    const canvas = bitmapFromRows([
      [TRANSPARENT, TRANSPARENT, TRANSPARENT],
      [RED, RED, TRANSPARENT],
      [withAlpha(BLUE, 5), TRANSPARENT, TRANSPARENT],
      [TRANSPARENT, TRANSPARENT, TRANSPARENT],
    ]);

    expect(encodeScanlines(canvas, defaults)).toEqual([
      { start: [0, 0.25], end: [1 / 3, 0.25], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('returns an empty list for a fully transparent canvas', () => {
    expect(encodeScanlines(solidBitmap(5, 4, withAlpha(RED, 10)), defaults)).toEqual([]);
  });

  it('closes runs at the last visited column when striding', () => {
    const canvas = bitmapFromRows([[RED, RED, RED, BLUE, BLUE]]);

    expect(encodeScanlines(canvas, { ...defaults, samplingStride: 2 })).toEqual([
      { start: [0, 0], end: [0.4, 0], color: '#FF0000', thickness: 2 },
      { start: [0.8, 0], end: [0.8, 0], color: '#0000FF', thickness: 2 },
    ]);
  });

  it('closes a run ending at the row edge on the greatest visited column', () => {
    const canvas = solidBitmap(4, 1, RED);

    expect(encodeScanlines(canvas, { ...defaults, samplingStride: 3 })).toEqual([
      { start: [0, 0], end: [0.75, 0], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('visits only every stride-th row', () => {
    const canvas = solidBitmap(3, 3, RED);

    expect(encodeScanlines(canvas, { ...defaults, samplingStride: 2 })).toEqual([
      { start: [0, 0], end: [2 / 3, 0], color: '#FF0000', thickness: 2 },
      { start: [0, 2 / 3], end: [2 / 3, 2 / 3], color: '#FF0000', thickness: 2 },
    ]);
  });

  it('keeps commands horizontal, ordered and at the configured thickness', () => {
    const canvas = bitmapFromRows([
      [RED, BLUE, BLUE, TRANSPARENT, GREEN],
      [TRANSPARENT, GREEN, GREEN, GREEN, RED],
      [BLUE, TRANSPARENT, BLUE, TRANSPARENT, BLUE],
    ]);

    const commands = encodeScanlines(canvas, { ...defaults, brushThickness: 3 });

    expect(commands).toHaveLength(8);
    for (const command of commands) {
      expect(command.start[1]).toBe(command.end[1]);
      expect(command.start[0]).toBeLessThanOrEqual(command.end[0]);
      expect(command.thickness).toBe(3);
      expect(command.color).toMatch(/^#[0-9A-F]{6}$/);
    }
  });

  it('is deterministic for the same canvas and parameters', () => {
    const canvas = bitmapFromRows([
      [RED, RED, BLUE],
      [GREEN, TRANSPARENT, GREEN],
    ]);

    expect(encodeScanlines(canvas, defaults)).toEqual(encodeScanlines(canvas, defaults));
  });
});
