import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { applyPalette, GIFEncoder, quantize } from 'gifenc';
import { PNG } from 'pngjs';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { AnimationFrameDecoder } from '@/infrastructure/stroke-conversion/index.js';

import { BLUE, RED, bitmapFromRows } from '../../../helpers/bitmaps.js';

let workDir: string;

beforeAll(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'frame-decoder-'));
});

afterAll(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

function encodeGif(width: number, height: number, frameCount: number): Buffer {
  const encoder = GIFEncoder();

  for (let index = 0; index < frameCount; index += 1) {
    const rgba = new Uint8ClampedArray(width * height * 4);
    for (let pixel = 0; pixel < width * height; pixel += 1) {
      const shade = pixel % 2 === index % 2 ? 200 : 40;
      rgba.set([shade, shade, shade, 255], pixel * 4);
    }

    const palette = quantize(rgba, 256);
    encoder.writeFrame(applyPalette(rgba, palette), width, height, { palette, delay: 50 });
  }

  encoder.finish();
  return Buffer.from(encoder.bytes());
}

describe('AnimationFrameDecoder', () => {
  const decoder = new AnimationFrameDecoder();

  it('decodes a GIF file into full-size frames', async () => {
    const gifPath = path.join(workDir, 'two-frames.gif');
    await fs.writeFile(gifPath, encodeGif(4, 2, 2));

    const decoded = await decoder.decode({ type: 'gif', path: gifPath });
    const frames = Array.from(decoded.frames);

    expect(decoded.metadata).toMatchObject({
      width: 4,
      height: 2,
      frameCount: 2,
      declaredDelayMs: 50,
    });
    expect(frames).toHaveLength(2);
    expect(frames[0]?.data).toHaveLength(4 * 2 * 4);
  });

  it('decodes a PNG file as a single frame without a declared delay', async () => {
    const png = new PNG({ width: 2, height: 1 });
    png.data.set([255, 0, 0, 255, 0, 0, 255, 128]);
    const pngPath = path.join(workDir, 'still.png');
    await fs.writeFile(pngPath, PNG.sync.write(png));

    const decoded = await decoder.decode({ type: 'png', path: pngPath });
    const frames = Array.from(decoded.frames);

    expect(decoded.metadata).toMatchObject({
      width: 2,
      height: 1,
      frameCount: 1,
      declaredDelayMs: undefined,
    });
    expect(Array.from(frames[0]?.data ?? [])).toEqual([255, 0, 0, 255, 0, 0, 255, 128]);
  });

  it('passes in-memory frame sequences through with a stable fingerprint', async () => {
    const frames = [bitmapFromRows([[RED, BLUE]])];

    const first = await decoder.decode({ type: 'frameSequence', frames, delayMs: 80 });
    const second = await decoder.decode({ type: 'frameSequence', frames, delayMs: 80 });

    expect(first.metadata.declaredDelayMs).toBe(80);
    expect(first.metadata.fingerprint).toBe(second.metadata.fingerprint);
    expect(Array.from(first.frames)).toEqual(frames);
  });

  it('rejects frames whose buffer does not match their dimensions', async () => {
    const malformed = { width: 2, height: 2, data: new Uint8ClampedArray(4) };

    await expect(
      decoder.decode({ type: 'frameSequence', frames: [malformed] }),
    ).rejects.toMatchObject({ code: 'stroke-conversion.source-unreadable' });
  });

  it('reports a missing file as an unreadable source', async () => {
    await expect(
      decoder.decode({ type: 'gif', path: path.join(workDir, 'missing.gif') }),
    ).rejects.toMatchObject({
      code: 'stroke-conversion.source-unreadable',
      metadata: { source: path.join(workDir, 'missing.gif') },
    });
  });

  it('reports a file that is not a PNG as an unreadable source', async () => {
    const bogusPath = path.join(workDir, 'bogus.png');
    await fs.writeFile(bogusPath, 'plain text');

    await expect(decoder.decode({ type: 'png', path: bogusPath })).rejects.toMatchObject({
      code: 'stroke-conversion.source-unreadable',
    });
  });
});
