import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';

import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';

const GIF_SIGNATURE = 'GIF8';

export interface GifFrame {
  index: number;
  data: Uint8ClampedArray;
  delayMs: number | undefined;
  disposalType: number;
}

export interface DecodedGif {
  width: number;
  height: number;
  frameCount: number;
  /** Delay declared by the first frame; undefined when the file declares none. */
  declaredDelayMs: number | undefined;
  fingerprint: string;
  frames: Iterable<GifFrame>;
}

export async function loadGifBuffer(input: string | Buffer): Promise<Buffer> {
  if (typeof input === 'string') {
    return fs.readFile(input);
  }

  if (Buffer.isBuffer(input)) {
    return input;
  }

  throw new TypeError('GIF input must be a file path or Buffer');
}

export function isGifBuffer(buffer: Buffer): boolean {
  return buffer.subarray(0, GIF_SIGNATURE.length).toString('latin1') === GIF_SIGNATURE;
}

/**
 * Parses a GIF and exposes its frames as full logical-screen RGBA bitmaps. Frames are
 * composited lazily, one per iteration step, honoring each frame's disposal method.
 */
export function decodeGif(buffer: Buffer): DecodedGif {
  if (!isGifBuffer(buffer)) {
    throw new TypeError('Input does not carry a GIF signature');
  }

  const gif = parseGifBuffer(buffer);
  const parsedFrames = decompressFrames(gif, true);
  const width = gif.lsd.width;
  const height = gif.lsd.height;

  if (width <= 0 || height <= 0) {
    throw new RangeError(`GIF declares an empty logical screen (${width}x${height})`);
  }

  const [firstFrame] = parsedFrames;
  const declaredDelayMs = firstFrame ? getDelayMs(firstFrame) : undefined;

  return {
    width,
    height,
    frameCount: parsedFrames.length,
    declaredDelayMs,
    fingerprint: fingerprintBuffer(buffer),
    frames: {
      [Symbol.iterator]: () => expandToFullFrames(parsedFrames, width, height),
    },
  };
}

export function fingerprintBuffer(data: Uint8Array): string {
  return createHash('sha1').update(data).digest('hex');
}

function parseGifBuffer(buffer: Buffer): ReturnType<typeof parseGIF> {
  const arrayBuffer = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(arrayBuffer).set(buffer);
  return parseGIF(arrayBuffer);
}

function getDelayMs(frame: ParsedFrame): number | undefined {
  const delay: number | undefined = frame.delay;
  if (typeof delay !== 'number' || delay <= 0) {
    return undefined;
  }

  return delay;
}

function* expandToFullFrames(
  frames: ParsedFrame[],
  width: number,
  height: number,
): Generator<GifFrame> {
  let previous = new Uint8ClampedArray(width * height * 4);

  for (const [index, frame] of frames.entries()) {
    const beforeDrawing = previous;
    const working = new Uint8ClampedArray(previous);
    const { dims, patch } = frame;

    if (patch) {
      compositePatch(working, patch, dims, width, height);
    }

    const disposalType = frame.disposalType ?? 0;

    switch (disposalType) {
      case 2: {
        const cleared = new Uint8ClampedArray(working);
        clearPatch(cleared, dims, width, height);
        previous = cleared;
        break;
      }
      case 3: {
        previous = beforeDrawing;
        break;
      }
      default: {
        previous = working;
        break;
      }
    }

    yield {
      index,
      data: working,
      delayMs: getDelayMs(frame),
      disposalType,
    } satisfies GifFrame;
  }
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY < 0 || destY >= height) {
      continue;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      if (destX < 0 || destX >= width) {
        continue;
      }

      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3] ?? 0;
      if (alpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex] ?? 0;
      destination[destIndex + 1] = patch[patchIndex + 1] ?? 0;
      destination[destIndex + 2] = patch[patchIndex + 2] ?? 0;
      destination[destIndex + 3] = alpha;
    }
  }
}

function clearPatch(
  destination: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;
  const startY = Math.max(0, top);
  const endY = Math.min(height, top + patchHeight);
  const startX = Math.max(0, left);
  const endX = Math.min(width, left + patchWidth);

  for (let y = startY; y < endY; y += 1) {
    const rowStart = (y * width + startX) * 4;
    const rowEnd = (y * width + endX) * 4;
    if (rowEnd > rowStart) {
      destination.fill(0, rowStart, rowEnd);
    }
  }
}
