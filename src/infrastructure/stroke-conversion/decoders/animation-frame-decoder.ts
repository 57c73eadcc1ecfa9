import { promises as fs } from 'node:fs';

import {
  describeSource,
  type AnimationSource,
  type DecodedAnimation,
  type FrameDecoder,
  type RgbaBitmap,
} from '@domain/stroke-conversion/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { decodeGif, fingerprintBuffer, loadGifBuffer } from '@/shared/media/gifToolkit.js';
import { decodePng } from '@/shared/media/pngToolkit.js';

/**
 * Turns every supported {@link AnimationSource} into full-canvas RGBA frames.
 * Any failure to read or parse the source surfaces as
 * `stroke-conversion.source-unreadable`.
 */
export class AnimationFrameDecoder implements FrameDecoder {
  private readonly logger = createChildLogger({ module: 'AnimationFrameDecoder' });

  public async decode(source: AnimationSource): Promise<DecodedAnimation> {
    try {
      return await this.decodeSource(source);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.debug({ error: cause, source: describeSource(source) }, 'Source decoding failed');
      throw AppError.fromError(cause, 'stroke-conversion.source-unreadable', {
        source: describeSource(source),
      });
    }
  }

  private async decodeSource(source: AnimationSource): Promise<DecodedAnimation> {
    switch (source.type) {
      case 'gif': {
        return this.decodeGifFile(source.path);
      }
      case 'png': {
        return this.decodePngFile(source.path);
      }
      case 'frameSequence': {
        return this.decodeFrameSequence(source.frames, source.delayMs);
      }
      default: {
        const exhaustive: never = source;
        throw AppError.unsupported(
          'stroke-conversion.unsupported-source',
          'Unsupported animation source',
          { source: exhaustive },
        );
      }
    }
  }

  private async decodeGifFile(path: string): Promise<DecodedAnimation> {
    const gif = decodeGif(await loadGifBuffer(path));

    this.logger.debug(
      { path, frameCount: gif.frameCount, declaredDelayMs: gif.declaredDelayMs },
      'Decoded GIF source',
    );

    return {
      metadata: {
        width: gif.width,
        height: gif.height,
        frameCount: gif.frameCount,
        declaredDelayMs: gif.declaredDelayMs,
        fingerprint: gif.fingerprint,
      },
      frames: mapIterable(gif.frames, (frame) => ({
        width: gif.width,
        height: gif.height,
        data: frame.data,
      })),
    };
  }

  private async decodePngFile(path: string): Promise<DecodedAnimation> {
    const png = decodePng(await fs.readFile(path));

    return {
      metadata: {
        width: png.width,
        height: png.height,
        frameCount: 1,
        declaredDelayMs: undefined,
        fingerprint: png.fingerprint,
      },
      frames: [{ width: png.width, height: png.height, data: png.data }],
    };
  }

  private decodeFrameSequence(frames: RgbaBitmap[], delayMs: number | undefined): DecodedAnimation {
    const [first] = frames;
    if (!first) {
      throw new RangeError('Frame sequence is empty');
    }

    frames.forEach((frame, index) => {
      if (frame.width <= 0 || frame.height <= 0) {
        throw new RangeError(`Frame ${index} has empty dimensions (${frame.width}x${frame.height})`);
      }

      const expected = frame.width * frame.height * 4;
      if (frame.data.length !== expected) {
        throw new RangeError(
          `Frame ${index} holds ${frame.data.length} bytes, expected ${expected} for ${frame.width}x${frame.height} RGBA`,
        );
      }
    });

    return {
      metadata: {
        width: first.width,
        height: first.height,
        frameCount: frames.length,
        declaredDelayMs: delayMs !== undefined && delayMs > 0 ? delayMs : undefined,
        fingerprint: fingerprintFrames(frames),
      },
      frames,
    };
  }
}

function fingerprintFrames(frames: RgbaBitmap[]): string {
  const header = Buffer.from(frames.map((frame) => `${frame.width}x${frame.height}`).join(','));
  const body = Buffer.concat(
    frames.map((frame) => Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength)),
  );
  return fingerprintBuffer(Buffer.concat([header, body]));
}

function mapIterable<TInput, TOutput>(
  source: Iterable<TInput>,
  project: (value: TInput) => TOutput,
): Iterable<TOutput> {
  return {
    *[Symbol.iterator]() {
      for (const value of source) {
        yield project(value);
      }
    },
  };
}
